import type { Writable } from "stream";
import type { DisplaySink } from "../../types/engines";

export interface ConsoleSubtitleDisplayOptions {
  output?: Writable;
  showContext?: boolean;
}

const CLEAR_LINE = "\r\x1b[K";

// Partials overwrite one line; each translation is printed below it for good.
export class ConsoleSubtitleDisplay implements DisplaySink {
  private readonly output: Writable;
  private readonly showContext: boolean;
  private partialShown = false;

  constructor(options: ConsoleSubtitleDisplayOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.showContext = options.showContext ?? false;
  }

  onPartial(text: string): void {
    this.output.write(`${CLEAR_LINE}… ${text}`);
    this.partialShown = true;
  }

  onTranslation(original: string, translation: string, contextSummary: string): void {
    const lines = [original, `→ ${translation}`];
    if (this.showContext && contextSummary) {
      lines.push(contextSummary.replace(/^/gm, "  | "));
    }

    this.output.write(`${this.partialShown ? CLEAR_LINE : ""}${lines.join("\n")}\n\n`);
    this.partialShown = false;
  }
}
