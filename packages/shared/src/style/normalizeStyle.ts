// ─── Style Normalizer ────────────────────────────────────
// Folds every accepted style input into one canonical MarkerStyle. The raw
// input variant never leaves this module.

import {
  CYCLE_COLOURS,
  DEFAULT_MARKER_SIZE,
  MARKER_ANIMATIONS,
  MAX_MARKER_SIZE,
  MIN_MARKER_SIZE,
  lookupStylePreset,
} from '../constants/styles';
import { ValidationError, fail, ok, type Result } from '../errors';
import type { StyleAttributes, StyleInput } from '../types/inputs';
import type { MarkerAnimation, MarkerStyle } from '../types/map';

const ATTRIBUTE_DEFAULTS: Omit<MarkerStyle, 'colour'> = {
  size: DEFAULT_MARKER_SIZE,
  animation: 'none',
  gradient: false,
  glow: false,
};

/** Style used for groups that arrive without one. */
export const DEFAULT_STYLE: MarkerStyle = Object.freeze({
  colour: '#6b7280',
  size: DEFAULT_MARKER_SIZE,
  animation: 'none',
  gradient: false,
  glow: false,
});

function isAnimation(value: string): value is MarkerAnimation {
  return MARKER_ANIMATIONS.some((animation) => animation === value);
}

/** Palette colour for a non-semantic group index, wrapping around. */
export function cycleColour(index: number): string {
  const n = CYCLE_COLOURS.length;
  return CYCLE_COLOURS[((index % n) + n) % n];
}

function merge(base: MarkerStyle, overrides: StyleAttributes): Result<MarkerStyle> {
  const colour = overrides.colour ?? base.colour;
  if (colour.trim() === '') {
    return fail(new ValidationError('invalid_field', 'Colour must not be empty', 'colour'));
  }

  const size = overrides.size ?? base.size;
  if (!Number.isInteger(size) || size < MIN_MARKER_SIZE || size > MAX_MARKER_SIZE) {
    return fail(
      new ValidationError(
        'invalid_field',
        `Size must be an integer between ${MIN_MARKER_SIZE} and ${MAX_MARKER_SIZE}, got ${size}`,
        'size',
      ),
    );
  }

  const animation = overrides.animation ?? base.animation;
  if (!isAnimation(animation)) {
    return fail(
      new ValidationError(
        'invalid_field',
        `Animation must be one of ${MARKER_ANIMATIONS.join(', ')}, got "${animation}"`,
        'animation',
      ),
    );
  }

  return ok(
    Object.freeze({
      colour,
      size,
      animation,
      gradient: overrides.gradient ?? base.gradient,
      glow: overrides.glow ?? base.glow,
    }),
  );
}

function attributesOf(input: StyleAttributes): StyleAttributes {
  const { colour, size, animation, gradient, glow } = input;
  return { colour, size, animation, gradient, glow };
}

/**
 * Normalise a style input.
 *
 * - `"danger"` → the preset
 * - `{ preset: "danger", size: 8 }` → the preset with overrides
 * - `{ cycle: 3 }` → palette colour 3 with attribute defaults; any integer wraps
 * - `{ colour: "#3b82f6", glow: true }` → explicit attributes over defaults
 *
 * Colour is never checked beyond being non-empty: theme variables and
 * other free-form tokens pass straight through.
 */
export function normalizeStyle(input: StyleInput): Result<MarkerStyle> {
  if (typeof input === 'string') {
    const entry = lookupStylePreset(input);
    if (!entry) return fail(new ValidationError('unknown_preset', `Unknown style preset "${input}"`));
    return ok(entry.style);
  }

  if ('preset' in input) {
    const entry = lookupStylePreset(input.preset);
    if (!entry) {
      return fail(new ValidationError('unknown_preset', `Unknown style preset "${input.preset}"`));
    }
    return merge(entry.style, attributesOf(input));
  }

  if ('cycle' in input) {
    return merge({ ...ATTRIBUTE_DEFAULTS, colour: cycleColour(input.cycle) }, attributesOf(input));
  }

  if (typeof input.colour !== 'string') {
    return fail(new ValidationError('invalid_field', 'Colour is required', 'colour'));
  }
  return merge({ ...ATTRIBUTE_DEFAULTS, colour: input.colour }, attributesOf(input));
}
