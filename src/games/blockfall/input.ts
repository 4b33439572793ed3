/**
 * Keyboard input — pressed-key tracking and key event sources.
 *
 * Keys are identified by KeyboardEvent.code (physical key), so a held key
 * reads the same regardless of layout or modifiers.
 */

export interface KeyInputEvent {
  type: 'keydown' | 'keyup';
  code: string;
}

export type KeyEventListener = (event: KeyInputEvent) => void;

/**
 * Anything that can push key events to a listener. subscribe() returns the
 * unsubscribe function.
 */
export interface KeyEventSource {
  subscribe: (listener: KeyEventListener) => () => void;
}

export const KEYS = {
  LEFT: 'ArrowLeft',
  RIGHT: 'ArrowRight',
  UP: 'ArrowUp',
  DOWN: 'ArrowDown',
  RESTART: 'Enter',
  QUIT: 'KeyQ',
  ESCAPE: 'Escape',
} as const;

export class InputState {
  private pressed = new Set<string>();

  handleInput(event: KeyInputEvent): void {
    if (event.type === 'keydown') {
      this.pressed.add(event.code);
    } else {
      this.pressed.delete(event.code);
    }
  }

  isPressed(code: string): boolean {
    return this.pressed.has(code);
  }

  releaseAll(): void {
    this.pressed.clear();
  }
}

/**
 * Key events from window keydown/keyup (xterm.js in a browser)
 */
export function windowKeyEventSource(target: EventTarget = window): KeyEventSource {
  return {
    subscribe: (listener) => {
      const forward = (type: KeyInputEvent['type']) => (e: Event) => {
        if ('code' in e && typeof e.code === 'string') {
          listener({ type, code: e.code });
        }
      };
      const onKeyDown = forward('keydown');
      const onKeyUp = forward('keyup');
      target.addEventListener('keydown', onKeyDown);
      target.addEventListener('keyup', onKeyUp);
      return () => {
        target.removeEventListener('keydown', onKeyDown);
        target.removeEventListener('keyup', onKeyUp);
      };
    },
  };
}
