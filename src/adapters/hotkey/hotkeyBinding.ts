import { HotkeyError } from '../../utils/errors.js';

export interface HotkeyBinding {
  ctrl: boolean;
  shift: boolean;
  alt: boolean;
  key: string;
}

export const DEFAULT_HOTKEY = 'Ctrl+Shift+H';

const MODIFIER_ALIASES = new Map<string, 'ctrl' | 'shift' | 'alt'>([
  ['ctrl', 'ctrl'],
  ['control', 'ctrl'],
  ['shift', 'shift'],
  ['alt', 'alt'],
  ['option', 'alt'],
]);

export function normalizeKeyName(key: string): string {
  return key.length === 1 ? key.toUpperCase() : key.toLowerCase();
}

/** Parses bindings such as `Ctrl+Shift+H` or `alt+F5`. Exactly one non-modifier key is allowed. */
export function parseHotkey(text: string): HotkeyBinding {
  const parts = text.split('+').map((part) => part.trim());
  if (parts.some((part) => part.length === 0)) {
    throw new HotkeyError(`Invalid hotkey "${text}": empty key name`);
  }

  const binding: HotkeyBinding = { ctrl: false, shift: false, alt: false, key: '' };
  for (const part of parts) {
    const modifier = MODIFIER_ALIASES.get(part.toLowerCase());
    if (modifier) {
      if (binding[modifier]) {
        throw new HotkeyError(`Invalid hotkey "${text}": ${part} given twice`);
      }
      binding[modifier] = true;
      continue;
    }
    if (binding.key) {
      throw new HotkeyError(`Invalid hotkey "${text}": more than one key (${binding.key}, ${part})`);
    }
    binding.key = normalizeKeyName(part);
  }

  if (!binding.key) {
    throw new HotkeyError(`Invalid hotkey "${text}": no key besides modifiers`);
  }
  return binding;
}

export function formatHotkey(binding: HotkeyBinding): string {
  const parts: string[] = [];
  if (binding.ctrl) parts.push('Ctrl');
  if (binding.shift) parts.push('Shift');
  if (binding.alt) parts.push('Alt');
  const key = binding.key.length === 1 ? binding.key : binding.key.charAt(0).toUpperCase() + binding.key.slice(1);
  parts.push(key);
  return parts.join('+');
}
