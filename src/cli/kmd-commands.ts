import { readFileSync, writeFileSync } from "fs"
import { ZodError } from "zod"
import {
  decodeDataTypeFlags,
  describeImportError,
  type KmdBlock,
  type KmdHeader,
  type KmdTable,
  KmdLoader,
  KmdWriter,
  manifestToModels,
  parseManifest,
  preflightFile,
  readKmdFile,
  RenderType,
  resolveRenderType,
} from "../lib/engine/kmd"
import { CommandManager } from "./command-manager"
import { getCliConfig, setCliConfig } from "./config"

const formatVec = (values: number[]) => `(${values.map((v) => Number(v.toFixed(4))).join(", ")})`

function logHeader(header: KmdHeader, tables: KmdTable[]) {
  console.log(
    `📦 KMD v${header.version}, scale x${header.scaleMultiplier}, ${header.modelCount} model(s) declared, ${tables.length} table(s)`
  )
  console.log(`   Tables: ${header.modelTablesSize} bytes, blocks: ${header.modelBlocksSize} bytes`)
}

function logBlock(block: KmdBlock, table: KmdTable, index: number, total: number) {
  console.log(
    `  [${index + 1}/${total}] ${table.name} node=${block.nodeName} mesh=${block.meshName} vertices=${block.vertexCount} indices=${block.indexCount}`
  )
  if (!getCliConfig().verbose) return

  const types = Object.entries(decodeDataTypeFlags(block.dataTypeFlags))
    .filter(([, enabled]) => enabled)
    .map(([name]) => name)
  console.log(`     path: ${block.nodePath || "-"}`)
  console.log(
    `     position ${formatVec(block.position.toArray())} rotation ${formatVec(block.rotation.toArray())} size ${formatVec(block.size.toArray())}`
  )
  console.log(`     render: ${RenderType[resolveRenderType(block.renderType)]}, data: ${types.join(",") || "none"}`)
  if (!block.rotation.isNormalized()) {
    console.warn(`     ⚠️ Rotation of '${block.nodeName}' is not a unit quaternion`)
  }
}

function importCommand([, filePath]: string[]): number {
  console.log(`📥 Loading KMD file: ${filePath}`)
  const result = KmdLoader.load(filePath)
  if (!result.ok) {
    console.error(`❌ Import failed: ${describeImportError(result.error)}`)
    return 1
  }

  logHeader(result.header, result.tables)
  result.blocks.forEach((block, i) => logBlock(block, result.tables[i], i, result.blocks.length))
  console.log(`✅ Imported ${result.blocks.length} model(s)`)
  return 0
}

function inspectCommand([, filePath]: string[]): number {
  const preflight = preflightFile(filePath)
  if (!preflight.ok) {
    console.error(`❌ Inspect failed: ${describeImportError(preflight.error)}`)
    return 1
  }
  const file = readKmdFile(filePath)
  if (!file.ok) {
    console.error(`❌ Inspect failed: ${describeImportError(file.error)}`)
    return 1
  }

  const result = KmdLoader.inspect(file.data)
  if (!result.ok) {
    console.error(`❌ Inspect failed: ${describeImportError(result.error)}`)
    return 1
  }

  logHeader(result.header, result.tables)
  result.tables.forEach((table, i) => {
    console.log(`  [${i + 1}/${result.tables.length}] ${table.name} @ ${table.blockOffset} (${table.blockSize} bytes)`)
  })
  return 0
}

function packCommand([, manifestPath, outPath]: string[]): number {
  try {
    console.log(`🔄 Packing ${manifestPath} -> ${outPath}`)
    const manifest = parseManifest(JSON.parse(readFileSync(manifestPath, "utf-8")))
    const { models, options } = manifestToModels(manifest)
    const buffer = KmdWriter.createBundle(models, options)
    writeFileSync(outPath, new Uint8Array(buffer))
    console.log(`✅ Wrote ${models.length} model(s), ${buffer.byteLength} bytes`)
    return 0
  } catch (error) {
    if (error instanceof ZodError) {
      console.error("❌ Invalid manifest:")
      for (const issue of error.issues) {
        console.error(`   ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      }
    } else {
      console.error("❌ Pack failed:", error instanceof Error ? error.message : error)
    }
    return 1
  }
}

export function createKmdCommands(): CommandManager {
  const manager = new CommandManager()

  manager.addCommand({
    primary: ["help", "h"],
    description: "Lists all available commands.",
    paramCount: 1,
    run: () => {
      const { commandPrefix } = getCliConfig()
      console.log("Listing all commands. Use 'info' with a command name to get more info about that command")
      for (const c of manager.getCommands()) {
        console.log(`  ${c.primary.map((p) => commandPrefix + p).join(", ")}`)
      }
      return 0
    },
  })

  manager.addCommand({
    primary: ["info"],
    description: "Lists info about the chosen command.",
    paramCount: 2,
    run: ([, name]) => {
      const { commandPrefix } = getCliConfig()
      const command = manager.findCommand(name.startsWith(commandPrefix) ? name.slice(commandPrefix.length) : name)
      if (!command) {
        console.error(`❌ Command '${name}' does not exist!`)
        return 1
      }
      console.log(`primary variants: ${command.primary.join(", ")}`)
      console.log(`description: ${command.description}`)
      console.log(`parameter count: ${command.paramCount}`)
      return 0
    },
  })

  manager.addCommand({
    primary: ["import", "i"],
    description: "Imports a .kmd file and prints a summary of every model.",
    paramCount: 2,
    run: importCommand,
  })

  manager.addCommand({
    primary: ["inspect"],
    description: "Reads only the header and model tables of a .kmd file.",
    paramCount: 2,
    run: inspectCommand,
  })

  manager.addCommand({
    primary: ["pack"],
    description: "Encodes a JSON model manifest into a .kmd file.",
    paramCount: 3,
    run: packCommand,
  })

  return manager
}

// Entry point shared by the bin script and tests; '--verbose' may appear anywhere
export function runCli(argv: string[]): number {
  const params = argv.filter((a) => a !== "--verbose")
  if (params.length !== argv.length) setCliConfig({ verbose: true })
  return createKmdCommands().parseCommand(params)
}
