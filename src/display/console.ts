/**
 * Terminal display surface: transcript lines, committed replies, notices and a status spinner.
 */

import type { Writable } from "stream";

export interface IDisplaySurface {
  showUser(text: string): void;
  /** Committed reply; only called once playback has drained. */
  showAssistant(text: string): void;
  showNotice(text: string): void;
  /** Animated status line ("Thinking…"); null clears it. */
  setStatus(status: string | null): void;
}

const SPINNER = ["|", "/", "-", "\\"];

export interface ConsoleDisplayOptions {
  out?: Writable;
  assistantName: string;
  userLabel?: string;
  /** 0 disables the spinner (plain status line). */
  spinnerIntervalMs?: number;
}

export class ConsoleDisplay implements IDisplaySurface {
  private readonly out: Writable;
  private spinner: ReturnType<typeof setInterval> | null = null;
  private status: string | null = null;
  private frame = 0;

  constructor(private readonly opts: ConsoleDisplayOptions) {
    this.out = opts.out ?? process.stdout;
  }

  showUser(text: string): void {
    this.line(`${this.opts.userLabel ?? "You"}: ${text}`);
  }

  showAssistant(text: string): void {
    this.line(`${this.opts.assistantName}: ${text}`);
  }

  showNotice(text: string): void {
    this.line(text);
  }

  setStatus(status: string | null): void {
    this.clearStatusLine();
    this.stopSpinner();
    this.status = status;
    if (status === null) return;
    this.renderStatus();
    const interval = this.opts.spinnerIntervalMs ?? 120;
    if (interval > 0) {
      this.spinner = setInterval(() => {
        this.frame = (this.frame + 1) % SPINNER.length;
        this.clearStatusLine();
        this.renderStatus();
      }, interval);
      this.spinner.unref();
    }
  }

  private line(text: string): void {
    this.clearStatusLine();
    this.out.write(text + "\n");
    if (this.status !== null) this.renderStatus();
  }

  private renderStatus(): void {
    if (this.status !== null) this.out.write(`${SPINNER[this.frame]} ${this.status}`);
  }

  private clearStatusLine(): void {
    if (this.status !== null) this.out.write("\r\x1b[K");
  }

  private stopSpinner(): void {
    if (this.spinner) clearInterval(this.spinner);
    this.spinner = null;
  }
}
