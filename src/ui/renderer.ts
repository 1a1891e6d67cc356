import Table from "cli-table3";
import { createLogUpdate } from "log-update";
import type { TerminalCapabilities } from "./capabilities.js";
import type { UiTheme } from "./theme.js";

export const PANEL_WIDTH = 72;

export interface PanelOptions {
  width?: number;
}

export interface RendererOptions {
  /** Sink for plain lines; defaults to stdout. */
  write?: (text: string) => void;
}

type LiveWriter = ReturnType<typeof createLogUpdate>;

export class OutputRenderer {
  private liveWriter: LiveWriter | undefined;
  private liveActive = false;
  private readonly write: (text: string) => void;

  constructor(
    private readonly capabilities: TerminalCapabilities,
    private readonly theme: UiTheme,
    options: RendererOptions = {},
  ) {
    this.write = options.write ?? ((text) => process.stdout.write(text));
  }

  getCaps(): TerminalCapabilities {
    return this.capabilities;
  }

  getTheme(): UiTheme {
    return this.theme;
  }

  line(text = ""): void {
    this.write(`${text}\n`);
  }

  section(title: string): void {
    this.line(this.theme.colors.heading(title));
  }

  panel(title: string, lines: string[], options: PanelOptions = {}): void {
    if (this.capabilities.quiet || !this.capabilities.isTTY) {
      this.line(`${title}:`);
      for (const line of lines) {
        this.line(`- ${line}`);
      }
      this.line();
      return;
    }

    const body = lines.length > 0 ? lines : [""];
    const contentWidth = Math.max(title.length + 2, ...body.map((line) => line.length + 2));
    const width = options.width
      ? clamp(options.width, 40, 120)
      : Math.min(96, Math.max(40, contentWidth + 2));
    const { box } = this.theme;
    const edge = this.theme.colors.primary(box.v);

    this.line(this.theme.colors.primary(`${box.tl}${box.h.repeat(width - 2)}${box.tr}`));
    this.line(`${edge}${this.theme.colors.heading(center(title, width - 2))}${edge}`);
    this.line(this.theme.colors.primary(`${box.lt}${box.h.repeat(width - 2)}${box.rt}`));
    for (const line of body) {
      this.line(`${edge}${pad(` ${line}`, width - 2)}${edge}`);
    }
    this.line(this.theme.colors.primary(`${box.bl}${box.h.repeat(width - 2)}${box.br}`));
    this.line();
  }

  table(headers: string[], rows: string[][]): void {
    const tableOptions: ConstructorParameters<typeof Table>[0] = {
      head: headers,
      style: { head: [], border: [], compact: true },
    };
    if (this.capabilities.supportsColor) {
      tableOptions.style = { head: ["yellow"], border: ["gray"], compact: true };
    }
    const table = new Table(tableOptions);
    for (const row of rows) {
      table.push(row);
    }
    this.line(table.toString());
  }

  bulletList(items: string[], indent = 0): void {
    const prefix = `${" ".repeat(Math.max(0, indent))}${this.theme.symbols.dot}`;
    for (const item of items) {
      this.line(`${prefix} ${item}`);
    }
  }

  liveUpdate(text: string): void {
    this.liveWriter ??= createLogUpdate(process.stdout, { showCursor: false });
    this.liveActive = true;
    this.liveWriter(text);
  }

  liveDone(): void {
    if (!this.liveActive || !this.liveWriter) {
      return;
    }
    this.liveWriter.done();
    this.liveActive = false;
  }
}

export function pad(value: string, width: number): string {
  if (value.length >= width) return value;
  return `${value}${" ".repeat(width - value.length)}`;
}

function center(value: string, width: number): string {
  if (value.length >= width) return value.slice(0, width);
  const left = Math.floor((width - value.length) / 2);
  const right = width - value.length - left;
  return `${" ".repeat(left)}${value}${" ".repeat(right)}`;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
