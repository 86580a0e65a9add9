import { existsSync, readFileSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import {
    compile, compileExecutable, execute, failureOf,
    CompileOutput, HarnessOptions, ProcessRunner,
} from "../compiler"
import { loadConfig, Config, ConfigError } from "./config"
import { ok, section, rule } from "./log"

export type BuildOptions = {
    file?:   string
    cwd?:    string
    run?:    boolean
    runner?: ProcessRunner
}

function load(options: BuildOptions): { config: Config; output: CompileOutput } {
    const config = loadConfig(options.cwd ?? process.cwd(), options.file)
    if (!existsSync(config.entry)) throw new ConfigError(`source file not found: ${config.entry}`)
    const output = compile(readFileSync(config.entry, "utf8"))
    return { config, output }
}

function printTree(tree: string) {
    section("VISUAL PARSE TREE")
    if (tree) console.log(tree)
    rule()
}

export function cmdTree(options: BuildOptions = {}) {
    printTree(load(options).output.tree)
}

export function cmdEmit(options: BuildOptions = {}) {
    process.stdout.write(load(options).output.code)
}

export type BuildResult = {
    cPath:    string
    exePath:  string
    stdout?:  string     // only with run
}

export function build(options: BuildOptions = {}): BuildResult {
    const start = Date.now()
    const { config, output } = load(options)

    const harness: HarnessOptions = {
        outDir: config.out,
        name:   config.name,
        cc:     config.cc,
        cflags: config.cflags,
        runner: options.runner,
    }

    // ── Compile only ─────────────────────────────
    if (!options.run) {
        const report = compileExecutable(output.code, harness)
        if (report.status !== "built") throw failureOf(report)

        ok("C generated ", report.cPath)
        ok("executable  ", report.exePath)
        console.log(`\nBuild completed in ${Date.now() - start}ms`)
        return { cPath: report.cPath, exePath: report.exePath }
    }

    // ── Compile + run ────────────────────────────
    printTree(output.tree)

    const report = execute(output.code, harness)
    if (report.status !== "succeeded") throw failureOf(report)

    const resultPath = join(config.out, "result.txt")
    writeFileSync(resultPath, report.stdout)

    section("EXECUTION RESULTS")
    process.stdout.write(report.stdout)
    console.log(`\n(Output saved to '${resultPath}')`)
    rule()

    return { cPath: report.cPath, exePath: report.exePath, stdout: report.stdout }
}
