import { spawnSync } from "node:child_process"
import { existsSync, mkdirSync, writeFileSync } from "node:fs"
import { join, resolve } from "node:path"
import { ExternalToolFailure } from "../errors"

export type ProcessResult = {
    exitCode: number | null
    stdout: string
    stderr: string
    signal?: string | null
}

// Blocking call-and-wait; swapped for a fake in tests
export type ProcessRunner = (command: string, args: string[]) => ProcessResult

export const spawnRunner: ProcessRunner = (command, args) => {
    const proc = spawnSync(command, args, { encoding: "utf8" })
    if (proc.error) return { exitCode: null, stdout: "", stderr: proc.error.message }
    return { exitCode: proc.status, stdout: proc.stdout, stderr: proc.stderr, signal: proc.signal }
}

export const EXE_SUFFIX = process.platform === "win32" ? ".exe" : ""

export type HarnessOptions = {
    outDir:  string
    name:    string
    cc?:     string
    cflags?: string[]
    runner?: ProcessRunner
}

export type BuildReport =
    | { status: "built";          cPath: string; exePath: string }
    | { status: "compile-failed"; cPath: string; stderr: string }

export type ExecutionReport =
    | { status: "succeeded";      cPath: string; exePath: string; stdout: string }
    | { status: "compile-failed"; cPath: string; stderr: string }
    | { status: "run-failed";     cPath: string; exePath: string; exitCode: number | null; signal: string | null; stderr: string }

// Writes <outDir>/<name>.c and compiles it next to itself. Paths are made
// absolute: a bare "prog" would be looked up on PATH when run.
export function compileExecutable(code: string, options: HarnessOptions): BuildReport {
    const { name, cc = "gcc", cflags = [], runner = spawnRunner } = options
    const outDir = resolve(options.outDir)

    if (!existsSync(outDir)) mkdirSync(outDir, { recursive: true })

    const cPath   = join(outDir, name + ".c")
    const exePath = join(outDir, name + EXE_SUFFIX)
    writeFileSync(cPath, code)

    const compiled = runner(cc, [...cflags, cPath, "-o", exePath])
    if (compiled.exitCode !== 0) return { status: "compile-failed", cPath, stderr: compiled.stderr }

    return { status: "built", cPath, exePath }
}

export function execute(code: string, options: HarnessOptions): ExecutionReport {
    const built = compileExecutable(code, options)
    if (built.status === "compile-failed") return built

    const { cPath, exePath } = built
    const runner = options.runner ?? spawnRunner
    const run = runner(exePath, [])
    if (run.exitCode !== 0) {
        return {
            status: "run-failed", cPath, exePath,
            exitCode: run.exitCode, signal: run.signal ?? null, stderr: run.stderr,
        }
    }

    return { status: "succeeded", cPath, exePath, stdout: run.stdout }
}

export type FailedReport = Extract<BuildReport | ExecutionReport, { status: "compile-failed" | "run-failed" }>

export function failureOf(report: FailedReport): ExternalToolFailure {
    return report.status === "compile-failed"
        ? new ExternalToolFailure("compile", report.stderr)
        : new ExternalToolFailure("run", report.stderr, report.exitCode, report.signal)
}
