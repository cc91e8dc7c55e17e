/**
 * Key names accepted by browser_key.
 */

import type { KeyInput } from 'puppeteer-core';

export const SUPPORTED_KEYS = [
  'Enter',
  'Escape',
  'Tab',
  'Backspace',
  'Delete',
  'Insert',
  'Space',
  'ArrowUp',
  'ArrowDown',
  'ArrowLeft',
  'ArrowRight',
  'Home',
  'End',
  'PageUp',
  'PageDown',
  'F1',
  'F2',
  'F3',
  'F4',
  'F5',
  'F6',
  'F7',
  'F8',
  'F9',
  'F10',
  'F11',
  'F12',
  'Shift',
  'Control',
  'Alt',
  'Meta',
] as const satisfies readonly KeyInput[];

export type SupportedKey = (typeof SUPPORTED_KEYS)[number];

export function isSupportedKey(value: string): value is SupportedKey {
  return SUPPORTED_KEYS.some((key) => key === value);
}
