import chalk from "chalk"

// Console output shared by the commands

export const RULE = "-------------------------"

export function ok(what: string, path?: string) {
    const target = path ? ` ${chalk.dim("→")} ${chalk.dim(path)}` : ""
    console.log(`${chalk.green("✓")} ${what}${target}`)
}

export function fail(message: string, details?: string) {
    console.error(`${chalk.red("✗")} ${message}`)
    if (details) {
        const lines = details.trimEnd().split("\n").slice(0, 8)
        for (const line of lines) console.error(chalk.dim(`  ${line}`))
    }
}

export function section(title: string) {
    console.log(`\n${chalk.bold(`--- ${title} ---`)}`)
}

export function rule() {
    console.log(RULE)
}
