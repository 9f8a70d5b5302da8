import { describe, expect, it } from "vitest"
import { ZodError } from "zod"
import { TRIANGLE_VERTICES } from "../../../test/kmd-fixtures"
import { manifestToModels, parseManifest } from "./manifest"

describe("parseManifest", () => {
  it("fills defaults", () => {
    const manifest = parseManifest({ models: [{ nodeName: "crate", vertices: [] }] })
    expect(manifest).toEqual({
      scaleFactor: 0,
      models: [
        {
          nodeName: "crate",
          meshName: "",
          nodePath: "",
          dataTypes: {},
          renderType: "opaque",
          position: [0, 0, 0],
          rotation: [0, 0, 0, 1],
          size: [1, 1, 1],
          vertices: [],
          indices: [],
        },
      ],
    })
  })

  it("rejects partial vertex records", () => {
    expect(() => parseManifest({ models: [{ nodeName: "crate", vertices: [1, 2, 3] }] })).toThrow(ZodError)
  })

  it("rejects an empty model list and out of range selectors", () => {
    expect(() => parseManifest({ models: [] })).toThrow(ZodError)
    expect(() => parseManifest({ scaleFactor: 9, models: [{ nodeName: "a", vertices: [] }] })).toThrow(ZodError)
  })
})

describe("manifestToModels", () => {
  it("converts flags, render type and transforms", () => {
    const { models, options } = manifestToModels(
      parseManifest({
        scaleFactor: 5,
        models: [
          {
            nodeName: "lamp",
            dataTypes: { material: true, light: true },
            renderType: "masked",
            position: [1, 2, 3],
            vertices: TRIANGLE_VERTICES,
            indices: [0, 1, 2],
          },
        ],
      })
    )

    expect(options).toEqual({ scaleFactor: 5 })
    expect(models[0].dataTypeFlags).toBe(0b01001)
    expect(models[0].renderType).toBe(2)
    expect(models[0].position.toArray()).toEqual([1, 2, 3])
    expect(models[0].rotation.toArray()).toEqual([0, 0, 0, 1])
    expect(Array.from(models[0].indices)).toEqual([0, 1, 2])
  })
})
