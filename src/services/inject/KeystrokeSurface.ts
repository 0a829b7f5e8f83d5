/**
 * Text field that owns the caret. Implementations emit synthetic keystrokes at the current
 * caret position and reject when the platform refuses them.
 */
export interface KeystrokeSurface {
  /** Presses backspace `count` times. */
  delete(count: number): Promise<void>;
  /** Types `text` as-is; may contain any Unicode. */
  insert(text: string): Promise<void>;
}
