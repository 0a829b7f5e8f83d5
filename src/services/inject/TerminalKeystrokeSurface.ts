import type { KeystrokeSurface } from './KeystrokeSurface';

/** Edits text on a terminal line, where backspace moves the cursor without erasing. */
export class TerminalKeystrokeSurface implements KeystrokeSurface {
  public constructor(private readonly output: NodeJS.WritableStream) {}

  public async delete(count: number): Promise<void> {
    if (count <= 0) {
      return;
    }

    await this.write('\b \b'.repeat(count));
  }

  public async insert(text: string): Promise<void> {
    if (text.length === 0) {
      return;
    }

    await this.write(text);
  }

  private write(chunk: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(chunk, (error?: Error | null) => {
        if (error) {
          reject(error);
          return;
        }

        resolve();
      });
    });
  }
}
