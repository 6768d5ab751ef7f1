import { z } from 'zod';
import { OFF_FRAME_COORDINATES } from '../constants';

// ─── Primitive Validators ────────────────────────────────
// Reusable Zod refinements for geographic and colour data.

export const zLatitude = z.number().finite().min(-90).max(90);

export const zLongitude = z.number().finite().min(-180).max(180);

/** Wire coordinate: always a 2-element `[lat, lng]` array */
export const zLatLngPair = z.tuple([zLatitude, zLongitude]);

/** A resolved node's pair: in range, or the legacy off-frame placement. */
export const zPlacedLatLngPair = z.union([
  zLatLngPair,
  z.tuple([z.literal(OFF_FRAME_COORDINATES.lat), z.literal(OFF_FRAME_COORDINATES.lng)]),
]);

/** `#` + 6 hex digits */
export const zHexColour = z
  .string()
  .regex(/^#[0-9a-fA-F]{6}$/, 'Invalid hex colour (expected # + 6 hex digits)');

/** CSS custom property reference, e.g. `var(--primary)` */
export const zThemeVariable = z
  .string()
  .regex(/^var\(--[A-Za-z0-9_-]+\)$/, 'Invalid theme variable (expected var(--name))');

/** Any non-empty colour token. Free-form values pass through untouched. */
export const zColour = z.string().min(1, 'Colour must not be empty');

export const zRoomKey = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9:_.-]+$/, 'Room key may only contain letters, digits and : _ . -');

export type ColourKind = 'hex' | 'variable' | 'opaque';

export function describeColour(colour: string): ColourKind {
  if (zHexColour.safeParse(colour).success) return 'hex';
  if (zThemeVariable.safeParse(colour).success) return 'variable';
  return 'opaque';
}
