export const TOOL_NAME = "assayer";
export const TOOL_VERSION = "0.1.0";
