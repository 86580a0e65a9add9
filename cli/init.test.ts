import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { mkdtempSync, readFileSync, rmSync, existsSync, mkdirSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { cmdInit } from "./init"
import { ConfigError, loadConfig } from "./config"
import { compile } from "../compiler/main"

let cwd: string

beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "minic-init-"))
    vi.spyOn(console, "log").mockImplementation(() => {})
})

afterEach(() => {
    vi.restoreAllMocks()
    rmSync(cwd, { recursive: true, force: true })
})

describe("cmdInit", () => {
    it("creates a project from the template", () => {
        const dir = cmdInit("demo", cwd)

        expect(dir).toBe(join(cwd, "demo"))
        expect(existsSync(join(dir, "minic.config.json"))).toBe(true)

        const source = readFileSync(join(dir, "src", "main.mc"), "utf8")
        expect(source.split("\n")[0]).toBe("// demo")
        expect(source).toContain(`print("demo");`)
        expect(source).not.toContain("{{name}}")
    })

    it("copies every template file, dotfiles included", () => {
        const dir = cmdInit("dots", cwd)
        expect(existsSync(join(dir, ".gitignore"))).toBe(true)
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining(`Project "dots" created (3 files)`))
    })

    it("the generated config and program are valid", () => {
        const dir = cmdInit("sample", cwd)
        const config = loadConfig(dir)
        expect(config.entry).toBe(join(dir, "src", "main.mc"))

        const output = compile(readFileSync(config.entry, "utf8"))
        expect(output.symbols).toEqual(["a", "b"])
    })

    it("uses a default name", () => {
        expect(cmdInit(undefined, cwd)).toBe(join(cwd, "my-minic-app"))
    })

    it("refuses an existing folder", () => {
        mkdirSync(join(cwd, "taken"))
        expect(() => cmdInit("taken", cwd)).toThrow(ConfigError)
        expect(() => cmdInit("taken", cwd)).toThrow(`folder "taken" already exists`)
    })
})
