import * as AST from "../parser/ast"
import { InternalError } from "../errors"
import reserved from "./c-reserved.json"

// Lowers the AST to a standalone C translation unit

const INDENT = "    "

function unreachable(node: never): never {
    throw new InternalError(`no emission rule for node ${JSON.stringify(node)}`)
}

// Names C (or the two headers) already owns get a v_ prefix. Source names
// that start with v_ get one too, so two source names never meet in C.
const RESERVED = new Set<string>(reserved)
const PREFIX = "v_"

export function cName(name: string): string {
    const clashes = RESERVED.has(name) || name.startsWith(PREFIX) || /^_[A-Z_]/.test(name)
    return clashes ? PREFIX + name : name
}

export function genExpr(node: AST.Expr): string {
    switch (node.kind) {
        case "Number":
            return `${node.value}`

        case "Identifier":
            return cName(node.name)

        case "Assign":
            return `(${cName(node.name)} = ${genExpr(node.value)})`

        case "BinOp":
            if (node.op === "neg") return `(-${genExpr(node.left)})`
            return `(${genExpr(node.left)} ${node.op} ${genExpr(node.right)})`

        default:
            return unreachable(node)
    }
}

export function codegen(program: AST.StatementList): string {
    const lines: string[] = []
    let indent = 0

    const emit = (s: string) => lines.push(INDENT.repeat(indent) + s)
    const push = () => indent++
    const pop  = () => indent--

    // ── Statements ───────────────────────────────

    function genStmt(node: AST.Statement) {
        switch (node.kind) {

            case "Decl": {
                const name = cName(node.name)
                emit(node.init ? `int ${name} = ${genExpr(node.init)};` : `int ${name};`)
                break
            }

            case "Print":
                emit(`printf("%d\\n", ${genExpr(node.value)});`)
                break

            case "PrintString":
                emit(`printf("%s\\n", ${node.text});`)
                break

            case "If": {
                emit(`if (${genExpr(node.condition)}) {`)
                push()
                genBlock(node.then)
                pop()
                if (node.else) {
                    emit("} else {")
                    push()
                    genBlock(node.else)
                    pop()
                }
                emit("}")
                break
            }

            // Bare expression; only an assignment has an effect
            case "Assign":
            case "BinOp":
            case "Number":
            case "Identifier":
                emit(`${genExpr(node)};`)
                break

            default:
                unreachable(node)
        }
    }

    function genBlock(block: AST.StatementList) {
        for (const stmt of block.statements) genStmt(stmt)
    }

    // ── Translation unit ─────────────────────────

    emit("#include <stdio.h>")
    emit("#include <stdlib.h>")
    emit("")
    emit("int main() {")
    push()
    genBlock(program)
    emit("return 0;")
    pop()
    emit("}")

    return lines.join("\n") + "\n"
}
