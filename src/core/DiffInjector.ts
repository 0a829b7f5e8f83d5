import type { StructuredLogger } from '../logging/StructuredLogger';
import type { KeystrokeSurface } from '../services/inject/KeystrokeSurface';

export interface TextEdit {
  /** Characters kept untouched at the start of the field. */
  prefixLength: number;
  deleteCount: number;
  insertText: string;
}

export type InjectionOutcome = 'applied' | 'unchanged' | 'failed' | 'suspended';

export interface InjectionResult {
  outcome: InjectionOutcome;
  deleted: number;
  inserted: number;
  detail?: string;
}

/**
 * Prefix-anchored edit from `previous` to `next`, counted in Unicode code points so that a
 * surrogate pair is one backspace.
 */
export const computeEdit = (previous: string, next: string): TextEdit => {
  const before = Array.from(previous);
  const after = Array.from(next);
  const limit = Math.min(before.length, after.length);

  let prefixLength = 0;
  while (prefixLength < limit && before[prefixLength] === after[prefixLength]) {
    prefixLength += 1;
  }

  return {
    prefixLength,
    deleteCount: before.length - prefixLength,
    insertText: after.slice(prefixLength).join('')
  };
};

export class DiffInjector {
  private lastInjectedText = '';
  private desynced = false;

  public constructor(
    private readonly surface: KeystrokeSurface,
    private readonly logger?: StructuredLogger
  ) {}

  public getLastInjectedText(): string {
    return this.lastInjectedText;
  }

  public isSuspended(): boolean {
    return this.desynced;
  }

  /** Start of a new session: the cursor is assumed to sit after nothing we typed. */
  public reset(): void {
    this.lastInjectedText = '';
    this.desynced = false;
  }

  public async apply(fullText: string): Promise<InjectionResult> {
    if (this.desynced) {
      return { outcome: 'suspended', deleted: 0, inserted: 0 };
    }

    const edit = computeEdit(this.lastInjectedText, fullText);
    const inserted = Array.from(edit.insertText).length;

    if (edit.deleteCount === 0 && inserted === 0) {
      return { outcome: 'unchanged', deleted: 0, inserted: 0 };
    }

    try {
      if (edit.deleteCount > 0) {
        await this.surface.delete(edit.deleteCount);
      }

      if (inserted > 0) {
        await this.surface.insert(edit.insertText);
      }
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      // The field now holds an unknown mix of old and new text; stop editing it.
      this.desynced = true;
      this.logger?.warn('Keystroke injection failed; live edits suspended for this session', {
        detail,
        deleteCount: edit.deleteCount,
        insertLength: inserted
      });

      return { outcome: 'failed', deleted: 0, inserted: 0, detail };
    }

    this.lastInjectedText = fullText;
    this.logger?.debug('Applied transcript edit', {
      prefixLength: edit.prefixLength,
      deleteCount: edit.deleteCount,
      insertLength: inserted
    });

    return { outcome: 'applied', deleted: edit.deleteCount, inserted };
  }
}
