import { Token, TokenSource, TokenType } from "./token"
import { ParseError } from "../errors"

const KEYWORDS = new Map<string, TokenType>([
    ["int",   "INT"],
    ["print", "PRINT"],
    ["if",    "IF"],
    ["else",  "ELSE"],
])

const SINGLE: Record<string, TokenType> = {
    "=": "ASSIGN",
    "<": "LT",
    ">": "GT",
    "+": "PLUS",
    "-": "MINUS",
    "*": "STAR",
    "/": "SLASH",
    ";": "SEMI",
    "(": "LPAREN",
    ")": "RPAREN",
    "{": "LBRACE",
    "}": "RBRACE",
}

const DOUBLE: Record<string, TokenType> = {
    "==": "EQ",
    "!=": "NEQ",
    "<=": "LTE",
    ">=": "GTE",
}

const INT_MAX = 2147483647

const isDigit    = (c: string) => c >= "0" && c <= "9"
const isIdStart  = (c: string) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_"
const isIdPart   = (c: string) => isIdStart(c) || isDigit(c)

export function scan(source: string): TokenSource {
    let i    = 0
    let line = 1
    let col  = 1

    const peek = (offset = 0): string => source[i + offset] ?? ""

    const advance = (): string => {
        const c = source[i++]
        if (c === "\n") { line++; col = 1 } else { col++ }
        return c
    }

    function skipTrivia() {
        while (i < source.length) {
            const c = peek()
            if (c === " " || c === "\r" || c === "\t" || c === "\n") {
                advance()
            } else if (c === "/" && peek(1) === "/") {
                while (i < source.length && peek() !== "\n") advance()
            } else {
                return
            }
        }
    }

    function next(): Token {
        skipTrivia()

        const start = { line, col }
        const make  = (type: TokenType, value: string): Token => ({ type, value, ...start })

        if (i >= source.length) return make("EOF", "")

        const c = peek()

        // String "...", kept verbatim with its quotes
        if (c === '"') {
            let s = advance()
            while (i < source.length && peek() !== '"' && peek() !== "\n") {
                if (peek() === "\\" && peek(1) !== "" && peek(1) !== "\n") s += advance()
                s += advance()
            }
            if (peek() !== '"') throw new ParseError(make("STRING", s), "unterminated string literal")
            s += advance()
            return make("STRING", s)
        }

        if (isDigit(c)) {
            let n = ""
            while (isDigit(peek())) n += advance()
            if (isIdStart(peek())) {
                while (isIdPart(peek())) n += advance()
                throw new ParseError(make("NUMBER", n), "malformed number")
            }
            if (Number.parseInt(n, 10) > INT_MAX) {
                throw new ParseError(make("NUMBER", n), "integer literal out of range")
            }
            return make("NUMBER", n)
        }

        if (isIdStart(c)) {
            let word = ""
            while (isIdPart(peek())) word += advance()
            return make(KEYWORDS.get(word) ?? "ID", word)
        }

        // Two-character operators before single ones
        const pair = c + peek(1)
        const double = DOUBLE[pair]
        if (double) {
            advance(); advance()
            return make(double, pair)
        }

        advance()
        const single = SINGLE[c]
        if (single) return make(single, c)

        throw new ParseError(make("INVALID", c), "unknown character")
    }

    return { next }
}

export function lex(source: string): Token[] {
    const stream = scan(source)
    const tokens: Token[] = []
    while (true) {
        const t = stream.next()
        tokens.push(t)
        if (t.type === "EOF") return tokens
    }
}
