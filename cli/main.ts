#!/usr/bin/env node
import { cmdInit } from "./init"
import { build, cmdTree, cmdEmit } from "./build"
import { fail } from "./log"
import { CompileError, ExternalToolFailure } from "../compiler"
import { ConfigError } from "./config"

export const VERSION = "0.1.0"

const HELP = `
minic v${VERSION}: compiler for a minimal integer language, via C

COMMANDS:
  minic init [name]     Create a new project
  minic run [file]      Print the tree, compile and run
  minic build [file]    Generate C and compile it
  minic tree [file]     Print the parse tree
  minic emit [file]     Print the generated C
  minic help            Show this message

Without [file], the entry comes from minic.config.json, or src/main.mc.
`

// Returns the process exit status
export function main(args: string[]): number {
    const command: string | undefined = args[0]
    const arg: string | undefined = args[1]

    try {
        switch (command) {
            case "init":  cmdInit(arg); break
            case "run":   build({ file: arg, run: true }); break
            case "build": build({ file: arg }); break
            case "tree":  cmdTree({ file: arg }); break
            case "emit":  cmdEmit({ file: arg }); break

            case "help":
            case "--help":
            case "-h":
            case undefined:
                console.log(HELP)
                break

            default:
                fail(`Unknown command: "${command}"`)
                console.log(`  Use "minic help" to list the commands`)
                return 1
        }
        return 0
    } catch (e) {
        if (e instanceof ExternalToolFailure) {
            fail(e.message, e.stderr)
            return 1
        }
        if (e instanceof CompileError || e instanceof ConfigError) {
            fail(e.message)
            return 1
        }
        throw e
    }
}

if (require.main === module) {
    process.exitCode = main(process.argv.slice(2))
}
