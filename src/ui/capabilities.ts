export type UiThemeName = "mono" | "ember";

export interface TerminalCapabilities {
  isTTY: boolean;
  supportsUnicode: boolean;
  supportsColor: boolean;
  noColor: boolean;
  quiet: boolean;
  reducedMotion: boolean;
  animations: boolean;
  theme: UiThemeName;
}

export interface CapabilityOverrides {
  env?: NodeJS.ProcessEnv;
  isTTY?: boolean;
  platform?: NodeJS.Platform;
  supportsUnicode?: boolean;
  supportsColor?: boolean;
  quiet?: boolean;
  /** `false` from `--no-animation`; `true` only takes effect on an interactive terminal. */
  animation?: boolean;
}

export function detectTerminalCapabilities(overrides: CapabilityOverrides = {}): TerminalCapabilities {
  const env = overrides.env || process.env;
  const isTTY = overrides.isTTY ?? Boolean(process.stdout.isTTY);
  const platform = overrides.platform || process.platform;

  // https://no-color.org: any non-empty value disables color.
  const noColor = Boolean(env.NO_COLOR);
  const quiet = overrides.quiet ?? false;
  const ci = Boolean(env.CI);

  const supportsUnicode = overrides.supportsUnicode ?? detectUnicode(platform, env);
  const supportsColor = !noColor && (overrides.supportsColor ?? isTTY);

  const reducedMotion = !isTTY || ci || overrides.animation === false;
  const animations = !quiet && !reducedMotion;

  const requestedTheme = normalizeTheme(env.ASSAYER_THEME);
  const theme: UiThemeName = supportsColor ? requestedTheme : "mono";

  return {
    isTTY,
    supportsUnicode,
    supportsColor,
    noColor,
    quiet,
    reducedMotion,
    animations,
    theme,
  };
}

export function normalizeTheme(value?: string): UiThemeName {
  const normalized = (value || "").trim().toLowerCase();
  if (normalized === "mono") return "mono";
  return "ember";
}

function detectUnicode(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): boolean {
  if (platform !== "win32") {
    return true;
  }

  if (env.WT_SESSION || env.TERM_PROGRAM === "vscode") {
    return true;
  }

  const term = (env.TERM || "").toLowerCase();
  return term.includes("xterm") || term.includes("utf");
}
