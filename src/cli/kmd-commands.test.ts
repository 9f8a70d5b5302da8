import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs"
import { tmpdir } from "os"
import { join } from "path"
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest"
import { makeBundle, TRIANGLE_VERTICES } from "../test/kmd-fixtures"
import { importKmd } from "../lib/engine/kmd"
import { setCliConfig } from "./config"
import { createKmdCommands, runCli } from "./kmd-commands"

let dir: string
let log: MockInstance<typeof console.log>
let error: MockInstance<typeof console.error>

const logged = (spy: MockInstance<typeof console.log>) => spy.mock.calls.map((args) => args.join(" "))

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "kmd-cli-"))
})

afterAll(() => {
  rmSync(dir, { recursive: true, force: true })
})

beforeEach(() => {
  setCliConfig({ commandPrefix: "--", verbose: false })
  log = vi.spyOn(console, "log").mockImplementation(() => {})
  error = vi.spyOn(console, "error").mockImplementation(() => {})
  vi.spyOn(console, "warn").mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe("command dispatch", () => {
  it("requires the command prefix", () => {
    expect(runCli(["help"])).toBe(1)
    expect(logged(error)).toEqual(["❌ Target command 'help' is missing required prefix '--'!"])
  })

  it("rejects unknown commands", () => {
    expect(runCli(["--explode"])).toBe(1)
    expect(logged(error)).toEqual(["❌ Inserted command 'explode' does not exist!"])
  })

  it("rejects a wrong parameter count", () => {
    expect(runCli(["--import"])).toBe(1)
    expect(logged(error)).toEqual(["❌ Command 'import' takes 1 parameter(s), got 0"])
  })

  it("rejects an empty command line", () => {
    expect(runCli([])).toBe(1)
  })

  it("lists commands with their prefix", () => {
    expect(runCli(["--h"])).toBe(0)
    expect(logged(log).slice(1)).toEqual(["  --help, --h", "  --info", "  --import, --i", "  --inspect", "  --pack"])
  })

  it("describes one command", () => {
    expect(runCli(["--info", "--pack"])).toBe(0)
    expect(logged(log)).toEqual([
      "primary variants: pack",
      "description: Encodes a JSON model manifest into a .kmd file.",
      "parameter count: 3",
    ])
  })

  it("refuses duplicate keywords", () => {
    const manager = createKmdCommands()
    const added = manager.addCommand({ primary: ["i"], description: "", paramCount: 1, run: () => 0 })
    expect(added).toBe(false)
    expect(logged(error)).toEqual(["❌ Command 'i' already exists"])
  })

  it("honors an empty command prefix", () => {
    setCliConfig({ commandPrefix: "" })
    expect(runCli(["help"])).toBe(0)
  })
})

describe("--import", () => {
  it("prints a summary of every model", () => {
    const filePath = join(dir, "scene.kmd")
    writeFileSync(filePath, makeBundle())

    expect(runCli(["--import", filePath])).toBe(0)
    expect(logged(log)).toEqual([
      `📥 Loading KMD file: ${filePath}`,
      "📦 KMD v1, scale x1, 1 model(s) declared, 1 table(s)",
      "   Tables: 28 bytes, blocks: 304 bytes",
      "  [1/1] cube node=cube mesh=cube_mesh vertices=3 indices=3",
      "✅ Imported 1 model(s)",
    ])
  })

  it("prints block details with --verbose", () => {
    const filePath = join(dir, "verbose.kmd")
    writeFileSync(filePath, makeBundle())

    expect(runCli(["--verbose", "--import", filePath])).toBe(0)
    expect(logged(log).slice(4, 7)).toEqual([
      "     path: models/cube.fbx",
      "     position (1.5, -2, 3.25) rotation (0, 0, 0, 1) size (1, 2, 0.5)",
      "     render: Transparent, data: material,texture",
    ])
  })

  it("reports the import error and fails", () => {
    expect(runCli(["--import", join(dir, "nope.kmd")])).toBe(1)
    expect(logged(error)).toEqual(["❌ Import failed: RESULT_FILE_NOT_FOUND: File does not exist"])
  })
})

describe("--inspect", () => {
  it("lists table entries", () => {
    const filePath = join(dir, "inspect.kmd")
    writeFileSync(filePath, makeBundle())

    expect(runCli(["--inspect", filePath])).toBe(0)
    expect(logged(log).at(-1)).toBe("  [1/1] cube @ 46 (304 bytes)")
  })
})

describe("--pack", () => {
  it("writes a file the importer accepts", () => {
    const manifestPath = join(dir, "manifest.json")
    const outPath = join(dir, "packed.kmd")
    writeFileSync(
      manifestPath,
      JSON.stringify({
        scaleFactor: 1,
        models: [{ nodeName: "tri", meshName: "tri_mesh", vertices: TRIANGLE_VERTICES, indices: [0, 1, 2] }],
      })
    )

    expect(runCli(["--pack", manifestPath, outPath])).toBe(0)
    expect(readFileSync(outPath).byteLength).toBe(350)

    const result = importKmd(outPath)
    if (!result.ok) throw new Error(`import failed with ${result.error}`)
    expect(result.header.scaleMultiplier).toBe(10)
    expect(result.blocks[0].meshName).toBe("tri_mesh")
  })

  it("lists manifest problems", () => {
    const manifestPath = join(dir, "bad-manifest.json")
    writeFileSync(manifestPath, JSON.stringify({ models: [{ vertices: [1] }] }))

    expect(runCli(["--pack", manifestPath, join(dir, "unused.kmd")])).toBe(1)
    expect(logged(error)[0]).toBe("❌ Invalid manifest:")
    expect(logged(error)).toContain("   models.0.nodeName: Required")
  })
})
