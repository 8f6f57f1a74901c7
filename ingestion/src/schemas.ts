import { z } from "zod";

export const BenchmarkRecordSchema = z
  .object({
    bcp_47: z.string().min(1),
    language_name: z.string(),
    average: z.number().min(0).max(1).nullish().transform((v) => v ?? null),
  })
  .passthrough();

export const BenchmarkDumpSchema = z.array(BenchmarkRecordSchema);

const PropertiesSchema = z.record(z.unknown());

export const GeometryObjectSchema = z
  .object({
    type: z.string().nullable(),
    properties: PropertiesSchema.nullish(),
  })
  .passthrough();

export const GeometryCollectionSchema = z
  .object({
    type: z.literal("GeometryCollection"),
    geometries: z.array(GeometryObjectSchema),
  })
  .passthrough();

export const TopologySchema = z
  .object({
    type: z.literal("Topology"),
    objects: z.record(z.unknown()),
    arcs: z.array(z.unknown()),
  })
  .passthrough();

export const FeatureSchema = z
  .object({
    type: z.literal("Feature"),
    properties: PropertiesSchema.nullable(),
    geometry: z.unknown(),
  })
  .passthrough();

export const FeatureCollectionSchema = z
  .object({
    type: z.literal("FeatureCollection"),
    features: z.array(FeatureSchema),
  })
  .passthrough();

export const RegionSourceSchema = z.discriminatedUnion("type", [TopologySchema, FeatureCollectionSchema]);

export type BenchmarkRecord = z.infer<typeof BenchmarkRecordSchema>;
export type GeometryObject = z.infer<typeof GeometryObjectSchema>;
export type GeometryCollection = z.infer<typeof GeometryCollectionSchema>;
export type TopologySource = z.infer<typeof TopologySchema>;
export type FeatureSource = z.infer<typeof FeatureSchema>;
export type FeatureCollectionSource = z.infer<typeof FeatureCollectionSchema>;
export type RegionSource = z.infer<typeof RegionSourceSchema>;
