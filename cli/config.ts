import { existsSync, readFileSync } from "node:fs"
import { join, dirname, resolve, basename } from "node:path"

export const CONFIG_FILE = "minic.config.json"

export type Config = {
    entry:  string      // absolute path of the .mc source
    out:    string      // absolute output directory
    name:   string      // base name for <name>.c and the executable
    cc:     string
    cflags: string[]
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "ConfigError"
    }
}

type RawConfig = {
    entry?:  string
    out?:    string
    cc?:     string
    cflags?: string[]
}

function readRaw(path: string): RawConfig {
    let json: unknown
    try {
        json = JSON.parse(readFileSync(path, "utf8"))
    } catch (e) {
        throw new ConfigError(`${CONFIG_FILE}: invalid JSON (${e instanceof Error ? e.message : String(e)})`)
    }
    if (typeof json !== "object" || json === null || Array.isArray(json)) {
        throw new ConfigError(`${CONFIG_FILE}: expected a JSON object`)
    }

    const raw: RawConfig = {}
    for (const key of ["entry", "out", "cc"] as const) {
        const value: unknown = Reflect.get(json, key)
        if (value === undefined) continue
        if (typeof value !== "string") throw new ConfigError(`${CONFIG_FILE}: "${key}" must be a string`)
        raw[key] = value
    }

    const cflags: unknown = Reflect.get(json, "cflags")
    if (cflags !== undefined) {
        if (!Array.isArray(cflags) || !cflags.every((f): f is string => typeof f === "string")) {
            throw new ConfigError(`${CONFIG_FILE}: "cflags" must be an array of strings`)
        }
        raw.cflags = cflags
    }
    return raw
}

// Priority: explicit file > minic.config.json > src/main.mc
export function loadConfig(cwd: string, file?: string): Config {
    const configPath = join(cwd, CONFIG_FILE)
    const raw = existsSync(configPath) ? readRaw(configPath) : {}

    const entry = file
        ? resolve(cwd, file)
        : resolve(cwd, raw.entry ?? join("src", "main.mc"))

    const out = file && raw.out === undefined
        ? join(dirname(entry), "out")
        : resolve(cwd, raw.out ?? "out")

    return {
        entry,
        out,
        name:   basename(entry, ".mc"),
        cc:     raw.cc ?? "gcc",
        cflags: raw.cflags ?? [],
    }
}
