import {
  GlobalKeyboardListener,
  type IGlobalKey,
  type IGlobalKeyDownMap,
  type IGlobalKeyEvent,
  type IGlobalKeyListener
} from 'node-global-key-listener';
import type { StructuredLogger } from '../../logging/StructuredLogger';

export interface ParsedHotkey {
  source: string;
  triggerKey: IGlobalKey;
  requiredModifierGroups: IGlobalKey[][];
}

const MODIFIER_ALIASES: Record<string, IGlobalKey[]> = {
  command: ['LEFT META', 'RIGHT META'],
  cmd: ['LEFT META', 'RIGHT META'],
  meta: ['LEFT META', 'RIGHT META'],
  control: ['LEFT CTRL', 'RIGHT CTRL'],
  ctrl: ['LEFT CTRL', 'RIGHT CTRL'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT'],
  alt: ['LEFT ALT', 'RIGHT ALT'],
  option: ['LEFT ALT', 'RIGHT ALT'],
  commandorcontrol: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL'],
  cmdorctrl: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL']
};

// Single physical keys that can trigger on their own.
const TRIGGER_ALIASES: Record<string, IGlobalKey> = {
  space: 'SPACE',
  enter: 'RETURN',
  return: 'RETURN',
  tab: 'TAB',
  escape: 'ESCAPE',
  esc: 'ESCAPE',
  backspace: 'BACKSPACE',
  delete: 'DELETE',
  rightalt: 'RIGHT ALT',
  rightoption: 'RIGHT ALT',
  leftalt: 'LEFT ALT',
  rightctrl: 'RIGHT CTRL',
  rightcontrol: 'RIGHT CTRL',
  rightshift: 'RIGHT SHIFT',
  rightcmd: 'RIGHT META',
  rightcommand: 'RIGHT META'
};

const isMainKey = (value: string): value is IGlobalKey => /^(?:[A-Z0-9]|F(?:[1-9]|1[0-9]|2[0-4]))$/.test(value);

export const parseHotkey = (accelerator: string): ParsedHotkey => {
  const tokens = accelerator
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);

  if (tokens.length === 0) {
    throw new Error('Hotkey must not be empty');
  }

  const modifierGroups: IGlobalKey[][] = [];
  let trigger: IGlobalKey | undefined;

  for (const [index, token] of tokens.entries()) {
    const normalized = token.toLowerCase();
    const isLast = index === tokens.length - 1;
    const modifierGroup = MODIFIER_ALIASES[normalized];
    if (modifierGroup && !isLast) {
      modifierGroups.push(modifierGroup);
      continue;
    }

    const upper = token.toUpperCase();
    const candidate = TRIGGER_ALIASES[normalized] ?? (isMainKey(upper) ? upper : undefined);

    if (!candidate) {
      throw new Error(`Unsupported hotkey token '${token}' in ${accelerator}`);
    }

    if (trigger) {
      throw new Error(`Hotkey must define exactly one non-modifier key: ${accelerator}`);
    }

    trigger = candidate;
  }

  if (!trigger) {
    throw new Error(`Hotkey missing a trigger key: ${accelerator}`);
  }

  return {
    source: accelerator,
    triggerKey: trigger,
    requiredModifierGroups: modifierGroups
  };
};

/**
 * Turns raw key-down/key-up edges into toggles: auto-repeat while the key is held is ignored,
 * and a toggle closer than `debounceMs` to the previous one is dropped.
 */
export class ToggleGate {
  private held = false;
  private lastToggleAtMs = Number.NEGATIVE_INFINITY;

  public constructor(
    private readonly debounceMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /** Returns true when this key-down should toggle. */
  public press(): boolean {
    if (this.held) {
      return false;
    }

    this.held = true;
    const nowMs = this.now();
    if (nowMs - this.lastToggleAtMs < this.debounceMs) {
      return false;
    }

    this.lastToggleAtMs = nowMs;
    return true;
  }

  public release(): void {
    this.held = false;
  }
}

const hasAnyKeyDown = (down: IGlobalKeyDownMap, keys: IGlobalKey[]): boolean => keys.some((key) => down[key]);

/** Global hotkey that flips dictation on and off with one press. */
export class ToggleHotkey {
  private listener: GlobalKeyboardListener | undefined;
  private readonly parsedHotkey: ParsedHotkey;
  private readonly gate: ToggleGate;
  private readonly handler: IGlobalKeyListener;

  public constructor(
    accelerator: string,
    debounceMs: number,
    private readonly onToggle: () => Promise<void> | void,
    private readonly logger?: StructuredLogger
  ) {
    this.parsedHotkey = parseHotkey(accelerator);
    this.gate = new ToggleGate(debounceMs);
    this.handler = (event, down) => this.onKeyEvent(event, down);
  }

  public describeBinding(): string {
    return this.parsedHotkey.source;
  }

  public async start(): Promise<void> {
    if (this.listener) {
      return;
    }

    const listener = new GlobalKeyboardListener();
    await listener.addListener(this.handler);
    this.listener = listener;
    this.logger?.info('Toggle hotkey listener started', {
      hotkey: this.describeBinding()
    });
  }

  public stop(): void {
    if (!this.listener) {
      return;
    }

    this.listener.removeListener(this.handler);
    this.listener.kill();
    this.listener = undefined;
    this.gate.release();

    this.logger?.info('Toggle hotkey listener stopped');
  }

  private onKeyEvent(event: IGlobalKeyEvent, down: IGlobalKeyDownMap): boolean {
    if (event.name !== this.parsedHotkey.triggerKey) {
      return false;
    }

    if (event.state === 'UP') {
      this.gate.release();
      return false;
    }

    if (!this.areModifiersHeld(down)) {
      return false;
    }

    if (this.gate.press()) {
      Promise.resolve(this.onToggle()).catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error('Toggle hotkey callback failed', { detail });
      });
    }

    return true;
  }

  private areModifiersHeld(down: IGlobalKeyDownMap): boolean {
    return this.parsedHotkey.requiredModifierGroups.every((group) => hasAnyKeyDown(down, group));
  }
}
