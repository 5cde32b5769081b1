export type HotkeyDigit = "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9" | "0";

const DIGIT_TO_INDEX: Readonly<Record<HotkeyDigit, number>> = {
  "1": 0,
  "2": 1,
  "3": 2,
  "4": 3,
  "5": 4,
  "6": 5,
  "7": 6,
  "8": 7,
  "9": 8,
  "0": 9,
};

function isHotkeyDigit(value: string): value is HotkeyDigit {
  return Object.prototype.hasOwnProperty.call(DIGIT_TO_INDEX, value);
}

/**
 * Bookmark slot for a digit key: "1".."9" map to 0..8 and "0" to 9. Whether
 * the slot exists in the current bucket is up to the caller.
 */
export function hotkeyIndex(digit: string): number | null {
  return isHotkeyDigit(digit) ? DIGIT_TO_INDEX[digit] : null;
}

/**
 * Accepts keyboard codes for the number row and the keypad ("Digit3",
 * "Numpad3") as well as bare digits.
 */
export function hotkeyIndexFromKeyCode(code: string): number | null {
  const match = /^(?:Digit|Numpad)?([0-9])$/.exec(code);
  if (!match) return null;
  return hotkeyIndex(match[1]);
}

export interface HotkeyEvent {
  code: string;
  shiftKey?: boolean;
  ctrlKey?: boolean;
}

/**
 * Jump hotkeys need Shift or Ctrl so plain digits stay free for the host.
 */
export function resolveHotkey(event: HotkeyEvent): number | null {
  if (!event.shiftKey && !event.ctrlKey) return null;
  return hotkeyIndexFromKeyCode(event.code);
}
