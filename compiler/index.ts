export { lex, scan } from "./lexer/lexer"
export { tokenSource } from "./lexer/token"
export type { Token, TokenSource, TokenType } from "./lexer/token"
export { SymbolTable } from "./symbols/symbols"
export { parse } from "./parser/parser"
export * as AST from "./parser/ast"
export { renderTree, renderProgram } from "./render/tree"
export { codegen, genExpr, cName } from "./codegen/codegen"
export { execute, compileExecutable, failureOf, spawnRunner, EXE_SUFFIX } from "./harness/harness"
export type { ProcessRunner, ProcessResult, HarnessOptions, BuildReport, ExecutionReport, FailedReport } from "./harness/harness"
export { compile, tryCompile } from "./main"
export type { CompileOutput, CompileResult } from "./main"
export * from "./errors"
