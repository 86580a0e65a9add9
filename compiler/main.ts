import { scan }          from "./lexer/lexer"
import { parse }         from "./parser/parser"
import { SymbolTable }   from "./symbols/symbols"
import { renderProgram } from "./render/tree"
import { codegen }       from "./codegen/codegen"
import { CompileError }  from "./errors"
import * as AST from "./parser/ast"

export type CompileOutput = {
    program: AST.StatementList
    symbols: string[]       // declaration order
    tree:    string
    code:    string
}

export type CompileResult =
    | { ok: true;  output: CompileOutput }
    | { ok: false; error: CompileError }

// source → tokens → AST (+ checks) → tree / C
// The first compile error is thrown and nothing after it runs.
export function compile(source: string, symbols = new SymbolTable()): CompileOutput {
    const program = parse(scan(source), symbols)
    return {
        program,
        symbols: symbols.names(),
        tree:    renderProgram(program),
        code:    codegen(program),
    }
}

export function tryCompile(source: string): CompileResult {
    try {
        return { ok: true, output: compile(source) }
    } catch (e) {
        if (e instanceof CompileError) return { ok: false, error: e }
        throw e
    }
}
