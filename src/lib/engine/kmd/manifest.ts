import { z } from "zod"
import { Quat, Vec3 } from "../math"
import { encodeDataTypeFlags, MAX_MODEL_COUNT, RenderType, SCALE_FACTORS, VERTEX_FLOATS } from "./kmd-format"
import type { KmdModelInput, KmdWriterOptions } from "./kmd-writer"

const vec3 = z.tuple([z.number(), z.number(), z.number()])
const quat = z.tuple([z.number(), z.number(), z.number(), z.number()])

const RENDER_TYPES = {
  opaque: RenderType.Opaque,
  transparent: RenderType.Transparent,
  masked: RenderType.Masked,
} as const

export const KmdManifestModelSchema = z.object({
  name: z.string().optional(),
  nodeName: z.string().min(1),
  meshName: z.string().default(""),
  nodePath: z.string().default(""),
  dataTypes: z
    .object({
      material: z.boolean().optional(),
      texture: z.boolean().optional(),
      camera: z.boolean().optional(),
      light: z.boolean().optional(),
      animation: z.boolean().optional(),
    })
    .default({}),
  renderType: z.enum(["opaque", "transparent", "masked"]).default("opaque"),
  position: vec3.default([0, 0, 0]),
  rotation: quat.default([0, 0, 0, 1]), // x, y, z, w
  size: vec3.default([1, 1, 1]),
  vertices: z
    .array(z.number())
    .refine((v) => v.length % VERTEX_FLOATS === 0, {
      message: `vertices must hold ${VERTEX_FLOATS} floats per vertex`,
    }),
  indices: z.array(z.number().int().nonnegative().max(0xffffffff)).default([]),
})

export const KmdManifestSchema = z.object({
  scaleFactor: z
    .number()
    .int()
    .min(0)
    .max(SCALE_FACTORS.length - 1)
    .default(0),
  models: z.array(KmdManifestModelSchema).min(1).max(MAX_MODEL_COUNT),
})

export type KmdManifest = z.infer<typeof KmdManifestSchema>
export type KmdManifestModel = z.infer<typeof KmdManifestModelSchema>

// Throws ZodError on an invalid manifest
export function parseManifest(input: unknown): KmdManifest {
  return KmdManifestSchema.parse(input)
}

export function manifestToModels(manifest: KmdManifest): {
  models: KmdModelInput[]
  options: KmdWriterOptions
} {
  const models = manifest.models.map((m): KmdModelInput => ({
    name: m.name,
    nodeName: m.nodeName,
    meshName: m.meshName,
    nodePath: m.nodePath,
    dataTypeFlags: encodeDataTypeFlags(m.dataTypes),
    renderType: RENDER_TYPES[m.renderType],
    position: new Vec3(...m.position),
    rotation: new Quat(...m.rotation),
    size: new Vec3(...m.size),
    vertices: Float32Array.from(m.vertices),
    indices: Uint32Array.from(m.indices),
  }))
  return { models, options: { scaleFactor: manifest.scaleFactor } }
}
