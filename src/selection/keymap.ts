// Keyboard bindings for the crop window

/** Actions a key press can trigger */
export type KeyAction = 'commit' | 'reset' | 'cancel';

/**
 * Key names (KeyboardEvent.key) for each action. Letters match case-insensitively.
 */
export const KEY_BINDINGS: Record<KeyAction, readonly string[]> = {
  commit: ['c', 'Enter'],
  reset: ['r'],
  cancel: ['Escape'],
};

/**
 * Resolves a key name to its action, or null for unbound keys.
 */
export function resolveKeyAction(key: string): KeyAction | null {
  const normalized = key.length === 1 ? key.toLowerCase() : key;
  for (const action of ['commit', 'reset', 'cancel'] as const) {
    if (KEY_BINDINGS[action].includes(normalized)) {
      return action;
    }
  }
  return null;
}
