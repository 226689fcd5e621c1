/** Android key names accepted by `pressKey`, mapped to their keyevent codes. */
export const KEY_CODES: Record<string, string> = {
  BACK: "KEYCODE_BACK",
  HOME: "KEYCODE_HOME",
  ENTER: "KEYCODE_ENTER",
  MENU: "KEYCODE_MENU",
  RECENT: "KEYCODE_APP_SWITCH",
  SEARCH: "KEYCODE_SEARCH",
  VOLUME_UP: "KEYCODE_VOLUME_UP",
  VOLUME_DOWN: "KEYCODE_VOLUME_DOWN",
  POWER: "KEYCODE_POWER",
  TAB: "KEYCODE_TAB",
  DEL: "KEYCODE_DEL",
  DPAD_UP: "KEYCODE_DPAD_UP",
  DPAD_DOWN: "KEYCODE_DPAD_DOWN",
  DPAD_LEFT: "KEYCODE_DPAD_LEFT",
  DPAD_RIGHT: "KEYCODE_DPAD_RIGHT",
  DPAD_CENTER: "KEYCODE_DPAD_CENTER",
};

const KEY_ALIASES: Record<string, string> = {
  RECENTS: "RECENT",
  APP_SWITCH: "RECENT",
  VOLUMEUP: "VOLUME_UP",
  VOLUMEDOWN: "VOLUME_DOWN",
  DELETE: "DEL",
  BACKSPACE: "DEL",
  RETURN: "ENTER",
  UP: "DPAD_UP",
  DOWN: "DPAD_DOWN",
  LEFT: "DPAD_LEFT",
  RIGHT: "DPAD_RIGHT",
  CENTER: "DPAD_CENTER",
  OK: "DPAD_CENTER",
};

export function normalizeKeyName(name: string) {
  const upper = name.trim().toUpperCase().replace(/^KEYCODE_/, "").replace(/[\s-]+/g, "_");
  return KEY_ALIASES[upper] ?? upper;
}

export function toKeyCode(name: string): string | null {
  return KEY_CODES[normalizeKeyName(name)] ?? null;
}
