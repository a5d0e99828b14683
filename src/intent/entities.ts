/**
 * @fileoverview Entity conversion and typed per-intent views
 *
 * Entity maps carry loosely typed values: rule captures are strings, LLM
 * arguments may be numbers or nested maps. The decoders below turn an entity
 * map into the typed view a handler works with, or report why they cannot.
 */

import { Entities, EntityValue } from './types';
import { isArray, isBoolean, isNonEmptyString, isNumber, isObject, isString, toInteger, toNumber } from '../types/TypeGuards';

/**
 * Convert arbitrary decoded JSON into an entity value.
 * Non-finite numbers and functions are not representable and yield undefined.
 */
export function toEntityValue(value: unknown): EntityValue | undefined {
  if (value === null || isString(value) || isBoolean(value)) {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (isArray(value)) {
    const items: EntityValue[] = [];
    for (const item of value) {
      const converted = toEntityValue(item);
      if (converted !== undefined) {
        items.push(converted);
      }
    }
    return items;
  }
  if (isObject(value)) {
    return toEntities(value);
  }
  return undefined;
}

export function toEntities(source: Record<string, unknown>): Entities {
  const entities: Entities = {};
  for (const [key, value] of Object.entries(source)) {
    const converted = toEntityValue(value);
    if (converted !== undefined) {
      entities[key] = converted;
    }
  }
  return entities;
}

/**
 * Entity value as a trimmed, non-empty string; numbers are stringified
 */
export function entityString(entities: Entities, key: string): string | undefined {
  const value = entities[key];
  if (isNumber(value)) {
    return String(value);
  }
  if (isNonEmptyString(value)) {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  return undefined;
}

export function entityNumber(entities: Entities, key: string): number | undefined {
  return toNumber(entities[key]);
}

export function entityBoolean(entities: Entities, key: string): boolean | undefined {
  const value = entities[key];
  if (isBoolean(value)) {
    return value;
  }
  if (isString(value)) {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  return undefined;
}

/**
 * Outcome of decoding an entity map into a typed view
 */
export type Decoded<T> =
  | { ok: true; value: T }
  | { ok: false; missing: string }
  | { ok: false; invalid: string };

export interface MoveMouseEntities {
  x: number;
  y: number;
  /** Seconds */
  duration: number;
  relative: boolean;
}

export const DEFAULT_MOUSE_MOVE_DURATION = 0.25;

export function decodeMoveMouse(entities: Entities): Decoded<MoveMouseEntities> {
  const rawX = entities.x;
  const rawY = entities.y;
  if (rawX === undefined || rawX === null || rawY === undefined || rawY === null) {
    return { ok: false, missing: 'mouse_coordinates' };
  }

  const x = toInteger(rawX);
  const y = toInteger(rawY);
  const rawDuration = entities.duration;
  const duration = rawDuration === undefined || rawDuration === null
    ? DEFAULT_MOUSE_MOVE_DURATION
    : toNumber(rawDuration);

  if (x === undefined || y === undefined || duration === undefined) {
    return { ok: false, invalid: 'mouse_parameters' };
  }

  return { ok: true, value: { x, y, duration, relative: entityBoolean(entities, 'relative') ?? false } };
}

export type MouseButton = 'left' | 'right' | 'middle';

const MOUSE_BUTTON_NAMES: Readonly<Record<string, MouseButton>> = {
  left: 'left',
  right: 'right',
  middle: 'middle',
  '左键': 'left',
  '右键': 'right',
  '中键': 'middle',
};

export interface ClickMouseEntities {
  /** Both coordinates present, or neither (click at the current position) */
  position?: { x: number; y: number };
  button: MouseButton;
  clicks: number;
}

export function decodeClickMouse(entities: Entities): Decoded<ClickMouseEntities> {
  const rawX = entities.x;
  const rawY = entities.y;
  const hasX = rawX !== undefined && rawX !== null;
  const hasY = rawY !== undefined && rawY !== null;

  let position: ClickMouseEntities['position'];
  if (hasX && hasY) {
    const x = toInteger(rawX);
    const y = toInteger(rawY);
    if (x === undefined || y === undefined) {
      return { ok: false, invalid: 'click_parameters' };
    }
    position = { x, y };
  }

  const buttonName = entityString(entities, 'button');
  const button = buttonName === undefined ? 'left' : MOUSE_BUTTON_NAMES[buttonName.toLowerCase()];
  if (button === undefined) {
    return { ok: false, invalid: 'click_parameters' };
  }

  const rawClicks = entities.clicks;
  const clicks = rawClicks === undefined || rawClicks === null ? 1 : toInteger(rawClicks);
  if (clicks === undefined || clicks < 1) {
    return { ok: false, invalid: 'click_parameters' };
  }

  return { ok: true, value: { position, button, clicks } };
}

export interface ScreenRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface CaptureScreenEntities {
  filename: string;
  /** Absent for a full-screen capture */
  region?: ScreenRegion;
  /** Set when a region was given but could not be parsed */
  invalidRegion?: string;
}

export const DEFAULT_SCREENSHOT_FILENAME = 'screenshot.png';

export function decodeCaptureScreen(entities: Entities): CaptureScreenEntities {
  const filename = entityString(entities, 'filename') ?? DEFAULT_SCREENSHOT_FILENAME;
  const regionText = entityString(entities, 'region');
  if (regionText === undefined) {
    return { filename };
  }

  const parts = regionText.split(',').map((part) => toInteger(part));
  if (parts.length !== 4) {
    return { filename, invalidRegion: regionText };
  }
  const [left, top, width, height] = parts;
  if (left === undefined || top === undefined || width === undefined || height === undefined) {
    return { filename, invalidRegion: regionText };
  }
  return { filename, region: { left, top, width, height } };
}

/**
 * Hotkey keys arrive as "ctrl,a", "ctrl+a" or a list
 */
export function decodeHotkey(entities: Entities): Decoded<string[]> {
  const keys = entities.keys;
  if (keys === undefined || keys === null || keys === '') {
    return { ok: false, missing: 'hotkey_keys' };
  }

  let list: string[];
  if (isString(keys)) {
    list = keys.split(/[,+，]/);
  } else if (isArray(keys)) {
    list = keys.filter(isString);
  } else {
    return { ok: false, invalid: 'hotkey_format' };
  }

  list = list.map((key) => key.trim()).filter((key) => key.length > 0);
  if (list.length === 0) {
    return { ok: false, invalid: 'empty_hotkey_list' };
  }
  return { ok: true, value: list };
}
