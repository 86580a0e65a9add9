import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { build, cmdEmit, cmdTree } from "./build"
import { ConfigError } from "./config"
import { ProcessResult, ProcessRunner } from "../compiler/harness/harness"
import { DuplicateDeclarationError, ExternalToolFailure } from "../compiler/errors"

let cwd: string

function project(source: string) {
    mkdirSync(join(cwd, "src"))
    writeFileSync(join(cwd, "src", "main.mc"), source)
}

// Stands in for the C compiler and the built program
function fakeToolchain(...results: ProcessResult[]) {
    const commands: string[] = []
    const runner: ProcessRunner = (command) => {
        commands.push(command)
        return results[commands.length - 1] ?? { exitCode: 0, stdout: "", stderr: "" }
    }
    return { runner, commands }
}

beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "minic-build-"))
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "error").mockImplementation(() => {})
})

afterEach(() => {
    vi.restoreAllMocks()
    rmSync(cwd, { recursive: true, force: true })
})

describe("build", () => {
    it("compiles only, by default", () => {
        project(`int x = 5; print(x);`)
        const { runner, commands } = fakeToolchain()
        const result = build({ cwd, runner })

        expect(commands).toEqual(["gcc"])
        expect(result.stdout).toBeUndefined()
        expect(readFileSync(join(cwd, "out", "main.c"), "utf8")).toContain("    int x = 5;\n")
    })

    it("runs the program and saves its output", () => {
        project(`int a = 3; if (a > 2) { print(a); } else { print(0); }`)
        const { runner, commands } = fakeToolchain({ exitCode: 0, stdout: "", stderr: "" }, { exitCode: 0, stdout: "3\n", stderr: "" })
        const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true)

        const result = build({ cwd, runner, run: true })

        expect(commands).toHaveLength(2)
        expect(result.stdout).toBe("3\n")
        expect(readFileSync(join(cwd, "out", "result.txt"), "utf8")).toBe("3\n")
        expect(write).toHaveBeenCalledWith("3\n")
    })

    it("prints the tree before running", () => {
        project(`print("hello");`)
        const { runner } = fakeToolchain({ exitCode: 0, stdout: "", stderr: "" }, { exitCode: 0, stdout: "hello\n", stderr: "" })
        vi.spyOn(process.stdout, "write").mockImplementation(() => true)

        build({ cwd, runner, run: true })

        expect(console.log).toHaveBeenCalledWith("BLOCK\n+-- PRINT (String): \"hello\"")
    })

    it("a compile error stops before any tool runs", () => {
        project(`int x; int x;`)
        const { runner, commands } = fakeToolchain()
        expect(() => build({ cwd, runner })).toThrow(DuplicateDeclarationError)
        expect(commands).toEqual([])
    })

    it("a failing C compiler is an external tool failure", () => {
        project(`int x;`)
        const { runner } = fakeToolchain({ exitCode: 1, stdout: "", stderr: "ld: error" })
        let caught: unknown
        try { build({ cwd, runner, run: true }) } catch (e) { caught = e }
        expect(caught).toBeInstanceOf(ExternalToolFailure)
        expect(caught).toMatchObject({ stage: "compile", stderr: "ld: error" })
    })

    it("a crashing program is an external tool failure", () => {
        project(`int x = 1 / 0; print(x);`)
        const { runner } = fakeToolchain({ exitCode: 0, stdout: "", stderr: "" }, { exitCode: 136, stdout: "", stderr: "" })
        expect(() => build({ cwd, runner, run: true })).toThrow("Error: Program exited with status 136.")
    })

    it("a missing source file is a configuration error", () => {
        expect(() => build({ cwd })).toThrow(ConfigError)
        expect(() => build({ cwd })).toThrow(`source file not found: ${join(cwd, "src", "main.mc")}`)
    })

    it("takes an explicit file", () => {
        writeFileSync(join(cwd, "solo.mc"), `print(1);`)
        const { runner } = fakeToolchain()
        const result = build({ cwd, runner, file: "solo.mc" })
        expect(result.cPath).toBe(join(cwd, "out", "solo.c"))
    })
})

describe("cmdTree", () => {
    it("prints the tree between the header and the rule", () => {
        project(`int n = 2 + 3 * 4;`)
        cmdTree({ cwd })
        const printed = vi.mocked(console.log).mock.calls.map(call => call[0])
        expect(printed).toContain([
            "BLOCK",
            "+-- DECL (n)",
            "    +-- OP (+)",
            "        |-- NUM (2)",
            "        +-- OP (*)",
            "            |-- NUM (3)",
            "            +-- NUM (4)",
        ].join("\n"))
        expect(printed.at(-1)).toBe("-------------------------")
    })
})

describe("cmdEmit", () => {
    it("writes the generated C to stdout", () => {
        project(`print("hello");`)
        const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true)
        cmdEmit({ cwd })
        expect(write).toHaveBeenCalledWith(
            "#include <stdio.h>\n#include <stdlib.h>\n\nint main() {\n    printf(\"%s\\n\", \"hello\");\n    return 0;\n}\n",
        )
    })
})
