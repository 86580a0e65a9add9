// AST: tree built by the parser, read-only once parsing is done

export type Node =
    | StatementList
    | Decl
    | Print
    | PrintString
    | If
    | Assign
    | BinOp
    | Number
    | Identifier

export type Statement =
    | Decl
    | Print
    | PrintString
    | If
    | Expr

export type Expr =
    | Assign
    | BinOp
    | Number
    | Identifier

// ── Statements ──────────────────────────────

// { ... } and the program itself; order is execution order
export type StatementList = {
    readonly kind: "StatementList"
    readonly statements: readonly Statement[]
}

// int x;  /  int x = 5;
export type Decl = {
    readonly kind: "Decl"
    readonly name: string
    readonly init: Expr | null
}

// print(x + 1);
export type Print = {
    readonly kind: "Print"
    readonly value: Expr
}

// print("hello");
export type PrintString = {
    readonly kind: "PrintString"
    readonly text: string       // quotes included
}

// if (c) { } else { }
export type If = {
    readonly kind: "If"
    readonly condition: Expr
    readonly then: StatementList
    readonly else: StatementList | null
}

// ── Expressions ─────────────────────────────

// x = 5
export type Assign = {
    readonly kind: "Assign"
    readonly name: string
    readonly value: Expr
}

export type BinaryOperator = "+" | "-" | "*" | "/" | "==" | "!=" | "<" | ">" | "<=" | ">="

// a + b  /  -a
export type BinOp =
    | { readonly kind: "BinOp"; readonly op: BinaryOperator; readonly left: Expr; readonly right: Expr }
    | { readonly kind: "BinOp"; readonly op: "neg"; readonly left: Expr }

export type Number = {
    readonly kind: "Number"
    readonly value: number
}

export type Identifier = {
    readonly kind: "Identifier"
    readonly name: string
}
