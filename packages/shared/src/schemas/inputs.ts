import { z } from 'zod';
import { zColour } from './validators';

// ─── Producer Input Schemas ──────────────────────────────
// Shape checks for HTTP bodies. Range and enum checks are left to the
// normalisers so that they surface as per-node diagnostics, not a 400.

const StyleAttributesShape = {
  colour: z.string().optional(),
  size: z.number().optional(),
  animation: z.string().optional(),
  gradient: z.boolean().optional(),
  glow: z.boolean().optional(),
};

export const StyleInputSchema = z.union([
  z.string().min(1),
  z.object({ preset: z.string(), ...StyleAttributesShape }),
  z.object({ cycle: z.number().int(), ...StyleAttributesShape }),
  z.object({ ...StyleAttributesShape, colour: z.string() }),
]);

const LooseLatLngSchema = z.union([
  z.object({ lat: z.number(), lng: z.number() }),
  z.tuple([z.number(), z.number()]).transform(([lat, lng]) => ({ lat, lng })),
]);

export const MapNodeInputSchema = z.union([
  z.string().min(1),
  z.object({
    lat: z.number(),
    lng: z.number(),
    label: z.string().optional(),
    id: z.string().min(1).optional(),
  }),
  z.object({
    coordinates: LooseLatLngSchema,
    label: z.string().optional(),
    id: z.string().min(1).optional(),
  }),
]);

export const MarkerGroupInputSchema = z.object({
  id: z.string(),
  label: z.string().optional(),
  style: StyleInputSchema.optional(),
  nodes: z.array(z.unknown()),
  visible: z.boolean().optional(),
});

export const ThemeInputSchema = z.union([
  z.string().min(1),
  z
    .object({
      land: zColour,
      ocean: zColour,
      border: zColour,
      neutralMarker: zColour,
      neutralText: zColour,
    })
    .partial(),
]);

export const BoundingBoxSchema = z
  .object({
    minX: z.number().finite(),
    minY: z.number().finite(),
    maxX: z.number().finite(),
    maxY: z.number().finite(),
  })
  .refine((b) => b.maxX > b.minX && b.maxY > b.minY, 'Bounding box must have positive extents');

export const SceneConfigInputSchema = z
  .object({
    bbox: BoundingBoxSchema,
    throttleMs: z.number().int().min(0).max(10_000),
  })
  .partial();

export const FullStateInputSchema = z.object({
  marker_groups: z.array(MarkerGroupInputSchema),
  theme: ThemeInputSchema.optional(),
  config: SceneConfigInputSchema.optional(),
});

export const GroupUpdateInputSchema = z.object({
  nodes: z.array(z.unknown()),
  label: z.string().optional(),
  style: StyleInputSchema.optional(),
});

export const MarkerAddInputSchema = z.object({
  marker: z.unknown(),
});

export const VisibilityInputSchema = z.object({
  visible: z.boolean(),
});

export const ThemeChangeInputSchema = z.object({
  theme: ThemeInputSchema,
});

export const LocationEntrySchema = z.object({
  name: z.string().min(1),
  lat: z.number(),
  lng: z.number(),
});

export const LocationFileSchema = z.object({
  locations: z.record(LocationEntrySchema),
  aliases: z.record(LocationEntrySchema).default({}),
});
