import { Token, TokenSource, TokenType, tokenSource } from "../lexer/token"
import { SymbolTable } from "../symbols/symbols"
import { ParseError } from "../errors"
import * as AST from "./ast"

const SPELLING: Partial<Record<TokenType, string>> = {
    ID: "identifier", ASSIGN: '"="', SEMI: '";"', LPAREN: '"("', RPAREN: '")"',
    LBRACE: '"{"', RBRACE: '"}"', EOF: "end of input",
}

// Recursive descent over
//
//   program   := stmt_list
//   stmt_list := { statement }
//   statement := "int" ID [ "=" expr ] ";"
//              | "print" "(" ( expr | STRING ) ")" ";"
//              | "if" "(" expr ")" block [ "else" block ]
//              | expr ";"
//   block     := "{" stmt_list "}"
//
// Declarations and references are checked against `symbols` as each rule
// completes, in the order a bottom-up parser would reduce them: an
// initializer or right-hand side is checked before the name it binds.
export function parse(input: TokenSource | Token[], symbols = new SymbolTable()): AST.StatementList {
    const source    = Array.isArray(input) ? tokenSource(input) : input

    let current: Token | null = null

    // Pulled lazily so a token is only scanned once the grammar needs it
    const peek  = (): Token => {
        if (current === null) current = source.next()
        return current
    }
    const next  = (): Token => {
        const t = peek()
        current = null
        return t
    }
    const check = (type: TokenType): boolean => peek().type === type
    const eat   = (type: TokenType): Token => {
        if (!check(type)) throw new ParseError(peek(), `expected ${SPELLING[type] ?? type}`)
        return next()
    }

    // ── Expressions ───────────────────────────

    const COMPARISON: Partial<Record<TokenType, AST.BinaryOperator>> = {
        EQ: "==", NEQ: "!=", LT: "<", GT: ">", LTE: "<=", GTE: ">=",
    }
    const ADDITIVE: Partial<Record<TokenType, AST.BinaryOperator>> = {
        PLUS: "+", MINUS: "-",
    }
    const MULTIPLICATIVE: Partial<Record<TokenType, AST.BinaryOperator>> = {
        STAR: "*", SLASH: "/",
    }

    function parseExpr(): AST.Expr {
        return parseBinary(COMPARISON, () => parseBinary(ADDITIVE, () => parseBinary(MULTIPLICATIVE, parseUnary)))
    }

    // One left-associative precedence level
    function parseBinary(
        operators: Partial<Record<TokenType, AST.BinaryOperator>>,
        operand: () => AST.Expr,
    ): AST.Expr {
        let left = operand()
        while (true) {
            const op = operators[peek().type]
            if (op === undefined) return left
            next()
            left = { kind: "BinOp", op, left, right: operand() }
        }
    }

    function parseUnary(): AST.Expr {
        if (check("MINUS")) {
            next()
            return { kind: "BinOp", op: "neg", left: parseUnary() }
        }
        return parsePrimary()
    }

    function parsePrimary(): AST.Expr {
        const t = peek()

        if (t.type === "NUMBER") {
            next()
            return { kind: "Number", value: Number.parseInt(t.value, 10) }
        }

        if (t.type === "ID") {
            next()
            // ID "=" expr: lowest precedence, right associative
            if (check("ASSIGN")) {
                next()
                const value = parseExpr()
                symbols.requireDeclared(t.value)
                return { kind: "Assign", name: t.value, value }
            }
            symbols.requireDeclared(t.value)
            return { kind: "Identifier", name: t.value }
        }

        if (t.type === "LPAREN") {
            next()
            const expr = parseExpr()
            eat("RPAREN")
            return expr
        }

        throw new ParseError(t)
    }

    // ── Statements ────────────────────────────

    function parseBlock(): AST.StatementList {
        eat("LBRACE")
        const statements = parseStatements("RBRACE")
        eat("RBRACE")
        return { kind: "StatementList", statements }
    }

    function parseStatements(end: TokenType): AST.Statement[] {
        const statements: AST.Statement[] = []
        while (!check(end) && !check("EOF")) statements.push(parseStatement())
        return statements
    }

    function parseStatement(): AST.Statement {
        // int x;  /  int x = expr;
        if (check("INT")) {
            next()
            const name = eat("ID").value
            const init = check("ASSIGN") ? (next(), parseExpr()) : null
            eat("SEMI")
            symbols.declare(name)
            return { kind: "Decl", name, init }
        }

        // print(expr);  /  print("text");
        if (check("PRINT")) {
            next()
            eat("LPAREN")
            if (check("STRING")) {
                const text = next().value
                eat("RPAREN")
                eat("SEMI")
                return { kind: "PrintString", text }
            }
            const value = parseExpr()
            eat("RPAREN")
            eat("SEMI")
            return { kind: "Print", value }
        }

        // if (cond) { } else { }
        if (check("IF")) {
            next()
            eat("LPAREN")
            const condition = parseExpr()
            eat("RPAREN")
            const then = parseBlock()
            const elseBlock = check("ELSE") ? (next(), parseBlock()) : null
            return { kind: "If", condition, then, else: elseBlock }
        }

        const expr = parseExpr()
        eat("SEMI")
        return expr
    }

    // ── Program ───────────────────────────────

    const statements = parseStatements("EOF")
    eat("EOF")
    return { kind: "StatementList", statements }
}
