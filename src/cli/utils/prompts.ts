import type { Interface } from 'node:readline';

/**
 * Hands out readline lines one prompt at a time so the chat loop and origin
 * prompts can share a single interface. `prompt` resolves to `null` once
 * input is closed.
 */
export class LineReader {
  private buffered: string[] = [];
  private waiting: Array<(line: string | null) => void> = [];
  private closed = false;

  constructor(private rl: Interface) {
    rl.on('line', (line) => {
      const waiter = this.waiting.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.buffered.push(line);
      }
    });
    rl.on('close', () => {
      this.closed = true;
      for (const waiter of this.waiting.splice(0)) waiter(null);
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  prompt(text: string): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(null);

    this.rl.setPrompt(text);
    this.rl.prompt();
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}

/**
 * Accepts a 1-based index or an origin name; anything else picks the first origin
 */
export function parseOriginChoice(answer: string | null, origins: string[]): string {
  const fallback = origins[0] ?? '';
  const trimmed = answer?.trim() ?? '';
  if (trimmed === '') return fallback;

  if (origins.includes(trimmed)) return trimmed;

  if (/^\d+$/.test(trimmed)) {
    return origins[Number(trimmed) - 1] ?? fallback;
  }
  return fallback;
}
