import { Token } from "./lexer/token"

// Every compile error is fatal: the first one raised ends the run

export type CompileErrorKind =
    | "DuplicateDeclaration"
    | "UseBeforeDeclaration"
    | "SyntaxError"

export abstract class CompileError extends Error {
    abstract readonly kind: CompileErrorKind
}

// int x; int x;
export class DuplicateDeclarationError extends CompileError {
    readonly kind = "DuplicateDeclaration"

    constructor(readonly identifier: string) {
        super(`Error: Variable '${identifier}' is already declared!`)
        this.name = "DuplicateDeclarationError"
    }
}

// y = 1;  without  int y;
export class UseBeforeDeclarationError extends CompileError {
    readonly kind = "UseBeforeDeclaration"

    constructor(readonly identifier: string) {
        super(`Semantic Error: Variable '${identifier}' used but not declared.`)
        this.name = "UseBeforeDeclarationError"
    }
}

export class ParseError extends CompileError {
    readonly kind = "SyntaxError"

    constructor(readonly token: Token, readonly detail?: string) {
        const found = token.type === "EOF" ? "end of input"
            : token.type === "STRING" ? token.value
            : `"${token.value}"`
        const suffix = detail ? `, ${detail}` : ""
        super(`Parse error: unexpected ${found} at line ${token.line}, col ${token.col}${suffix}`)
        this.name = "ParseError"
    }
}

export type ToolStage = "compile" | "run"

export class ExternalToolFailure extends Error {
    readonly kind = "ExternalToolFailure"

    constructor(
        readonly stage: ToolStage,
        readonly stderr: string,
        exitCode: number | null = null,
        signal: string | null = null,
    ) {
        super(stage === "compile" ? "Error: Compilation failed."
            : signal ? `Error: Program terminated by signal ${signal}.`
            : `Error: Program exited with status ${exitCode ?? "unknown"}.`)
        this.name = "ExternalToolFailure"
    }
}

export class InternalError extends Error {
    constructor(message: string) {
        super(`Internal error: ${message}`)
        this.name = "InternalError"
    }
}
