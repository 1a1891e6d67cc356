import { Chalk } from "chalk";
import type { CategoryStatus, Severity } from "../types.js";
import type { TerminalCapabilities, UiThemeName } from "./capabilities.js";

type Paint = (value: string) => string;

export interface UiTheme {
  name: UiThemeName;
  colors: {
    primary: Paint;
    heading: Paint;
    ok: Paint;
    warn: Paint;
    err: Paint;
    dim: Paint;
    accent: Paint;
  };
  severity: Record<Severity, Paint>;
  symbols: {
    tick: string;
    cross: string;
    skip: string;
    dot: string;
    pending: string;
    spinnerFrames: string[];
  };
  box: {
    tl: string;
    tr: string;
    bl: string;
    br: string;
    h: string;
    v: string;
    lt: string;
    rt: string;
  };
}

export function createTheme(capabilities: TerminalCapabilities): UiTheme {
  const chalk = new Chalk({ level: capabilities.supportsColor ? 3 : 0 });
  const identity: Paint = (value) => value;
  const unicode = capabilities.supportsUnicode;
  const mono = capabilities.theme === "mono";

  const colors = mono
    ? {
        primary: identity,
        heading: identity,
        ok: identity,
        warn: identity,
        err: identity,
        dim: identity,
        accent: identity,
      }
    : {
        primary: (value: string) => chalk.hex("#FFB454")(value),
        heading: (value: string) => chalk.bold.hex("#FFB454")(value),
        ok: (value: string) => chalk.hex("#7FD962")(value),
        warn: (value: string) => chalk.hex("#FFD866")(value),
        err: (value: string) => chalk.hex("#FF6B6B")(value),
        dim: (value: string) => chalk.hex("#8A8F98")(value),
        accent: (value: string) => chalk.hex("#73B8FF")(value),
      };

  const severity: Record<Severity, Paint> = mono
    ? { critical: identity, high: identity, medium: identity, low: identity, info: identity }
    : {
        critical: (value) => chalk.bold.bgHex("#B3261E").white(value),
        high: colors.err,
        medium: colors.warn,
        low: colors.accent,
        info: colors.dim,
      };

  const symbols = unicode && !mono
    ? {
        tick: "✓",
        cross: "✕",
        skip: "○",
        dot: "•",
        pending: "·",
        spinnerFrames: ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"],
      }
    : {
        tick: "[ok]",
        cross: "[x]",
        skip: "[-]",
        dot: "*",
        pending: ".",
        spinnerFrames: ["-", "\\", "|", "/"],
      };

  const box = unicode
    ? { tl: "┌", tr: "┐", bl: "└", br: "┘", h: "─", v: "│", lt: "├", rt: "┤" }
    : { tl: "+", tr: "+", bl: "+", br: "+", h: "-", v: "|", lt: "+", rt: "+" };

  return {
    name: capabilities.theme,
    colors,
    severity,
    symbols,
    box,
  };
}

export function statusSymbol(theme: UiTheme, status: CategoryStatus): string {
  if (status === "success") return theme.colors.ok(theme.symbols.tick);
  if (status === "error") return theme.colors.err(theme.symbols.cross);
  return theme.colors.dim(theme.symbols.skip);
}
