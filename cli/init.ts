import { join } from "node:path"
import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs"
import { ConfigError } from "./config"
import { ok } from "./log"

// template/ sits at the package root, one level above cli/ in the sources
// and two above dist/cli/ once built
function findTemplateDir(): string {
    const candidates = [join(__dirname, "..", "template"), join(__dirname, "..", "..", "template")]
    const found = candidates.find(dir => existsSync(dir))
    if (!found) throw new ConfigError(`template not found (looked in ${candidates.join(", ")})`)
    return found
}

export function cmdInit(name?: string, cwd = process.cwd()): string {
    const projectName = name ?? "my-minic-app"
    const projectDir = join(cwd, projectName)

    if (existsSync(projectDir)) throw new ConfigError(`folder "${projectName}" already exists`)

    const files = copyTemplate(findTemplateDir(), projectDir, { name: projectName })

    ok(`Project "${projectName}" created (${files.length} files)`, projectDir)
    console.log(`\n  cd ${projectName}`)
    console.log(`  minic run\n`)
    return projectDir
}

// Fills {{key}} placeholders from vars; unknown keys stay as written.
// Returns the paths of the files written.
function copyTemplate(src: string, dest: string, vars: Record<string, string>): string[] {
    mkdirSync(dest, { recursive: true })

    return readdirSync(src, { withFileTypes: true }).flatMap(entry => {
        const from = join(src, entry.name)
        const to   = join(dest, entry.name)

        if (entry.isDirectory()) return copyTemplate(from, to, vars)
        if (entry.name === ".gitkeep") return []

        const text = readFileSync(from, "utf8")
            .replace(/\{\{(\w+)\}\}/g, (placeholder: string, key: string) => vars[key] ?? placeholder)
        writeFileSync(to, text)
        return [to]
    })
}
