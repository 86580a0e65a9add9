import { describe, it, expect } from "vitest"
import { scan } from "../lexer/lexer"
import { parse } from "../parser/parser"
import { renderProgram, renderTree } from "./tree"

function tree(code: string): string {
    return renderProgram(parse(scan(code)))
}

describe("renderProgram", () => {
    it("declaration and print", () => {
        expect(tree(`int x = 5; print(x);`)).toBe([
            "BLOCK",
            "|-- DECL (x)",
            "|   +-- NUM (5)",
            "+-- PRINT (Expr)",
            "    +-- ID (x)",
        ].join("\n"))
    })

    it("if with else draws the else-block as the last branch", () => {
        expect(tree(`int a = 3; if (a > 2) { print(a); } else { print(0); }`)).toBe([
            "BLOCK",
            "|-- DECL (a)",
            "|   +-- NUM (3)",
            "+-- IF",
            "    |-- OP (>)",
            "    |   |-- ID (a)",
            "    |   +-- NUM (2)",
            "    |-- BLOCK",
            "    |   +-- PRINT (Expr)",
            "    |       +-- ID (a)",
            "    +-- ELSE",
            "        +-- PRINT (Expr)",
            "            +-- NUM (0)",
        ].join("\n"))
    })

    it("if without else has two branches", () => {
        expect(tree(`if (1) { print("y"); } print(2);`)).toBe([
            "BLOCK",
            "|-- IF",
            "|   |-- NUM (1)",
            "|   +-- BLOCK",
            "|       +-- PRINT (String): \"y\"",
            "+-- PRINT (Expr)",
            "    +-- NUM (2)",
        ].join("\n"))
    })

    it("string print, assignment and negation", () => {
        expect(tree(`print("hello"); int a; a = -5;`)).toBe([
            "BLOCK",
            "|-- PRINT (String): \"hello\"",
            "|-- DECL (a)",
            "+-- ASSIGN (=) a",
            "    +-- OP (neg)",
            "        +-- NUM (5)",
        ].join("\n"))
    })

    it("precedence shows in the nesting", () => {
        expect(tree(`int n = 2 + 3 * 4;`)).toBe([
            "BLOCK",
            "+-- DECL (n)",
            "    +-- OP (+)",
            "        |-- NUM (2)",
            "        +-- OP (*)",
            "            |-- NUM (3)",
            "            +-- NUM (4)",
        ].join("\n"))
    })

    it("empty program draws nothing", () => {
        expect(tree(``)).toBe("")
    })

    it("an empty block is a lone BLOCK", () => {
        expect(tree(`if (0) { }`)).toBe([
            "BLOCK",
            "+-- IF",
            "    |-- NUM (0)",
            "    +-- BLOCK",
        ].join("\n"))
    })
})

describe("renderTree", () => {
    it("renders any node as a root", () => {
        const [stmt] = parse(scan(`print(1 - 2);`)).statements
        expect(renderTree(stmt)).toBe([
            "PRINT (Expr)",
            "+-- OP (-)",
            "    |-- NUM (1)",
            "    +-- NUM (2)",
        ].join("\n"))
    })

    it("is pure: same text twice, tree untouched", () => {
        const program = parse(scan(`int a = 1; if (a == 1) { a = a + 1; } else { print("n"); } print(a);`))
        const before = structuredClone(program)
        const first = renderTree(program)
        expect(renderTree(program)).toBe(first)
        expect(program).toEqual(before)
    })
})
