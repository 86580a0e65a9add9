export type TokenType =
    // Keyword
    | "INT"         // int
    | "PRINT"       // print
    | "IF"          // if
    | "ELSE"        // else

    // Identifiers and literals
    | "ID"          // x, total, n_1
    | "NUMBER"      // 42
    | "STRING"      // "hello"  (quotes kept)

    // Operators
    | "ASSIGN"      // =
    | "EQ"          // ==
    | "NEQ"         // !=
    | "LT"          // <
    | "GT"          // >
    | "LTE"         // <=
    | "GTE"         // >=
    | "PLUS"        // +
    | "MINUS"       // -
    | "STAR"        // *
    | "SLASH"       // /

    // Punctuation
    | "SEMI"        // ;
    | "LPAREN"      // (
    | "RPAREN"      // )
    | "LBRACE"      // {
    | "RBRACE"      // }

    // Special
    | "INVALID"     // only ever carried by a lexical error
    | "EOF"

export type Token = {
    type: TokenType
    value: string
    line: number
    col: number
}

// Pull-style token stream: next() yields EOF forever once input is exhausted
export interface TokenSource {
    next(): Token
}

export function tokenSource(tokens: Token[]): TokenSource {
    let i = 0
    const last = tokens[tokens.length - 1]
    const eof: Token = last?.type === "EOF"
        ? last
        : { type: "EOF", value: "", line: last?.line ?? 1, col: last ? last.col + last.value.length : 1 }

    return {
        next: () => (i < tokens.length ? tokens[i++] : eof),
    }
}
