import * as AST from "../parser/ast"

// ASCII tree of the AST, one line per node:
//
//   BLOCK
//   |-- DECL (x)
//   |   +-- NUM (5)
//   +-- PRINT (Expr)
//       +-- ID (x)

function label(node: AST.Node, isElse: boolean): string {
    switch (node.kind) {
        case "StatementList": return isElse ? "ELSE" : "BLOCK"
        case "Decl":          return `DECL (${node.name})`
        case "Assign":        return `ASSIGN (=) ${node.name}`
        case "Print":         return "PRINT (Expr)"
        case "PrintString":   return `PRINT (String): ${node.text}`
        case "If":            return "IF"
        case "BinOp":         return `OP (${node.op})`
        case "Number":        return `NUM (${node.value})`
        case "Identifier":    return `ID (${node.name})`
    }
}

type Child = { node: AST.Node; isElse: boolean }

function children(node: AST.Node): Child[] {
    const plain = (...nodes: (AST.Node | null)[]): Child[] =>
        nodes.flatMap(n => (n ? [{ node: n, isElse: false }] : []))

    switch (node.kind) {
        case "StatementList": return plain(...node.statements)
        case "Decl":          return plain(node.init)
        case "Assign":        return plain(node.value)
        case "Print":         return plain(node.value)
        case "If": {
            const branches = plain(node.condition, node.then)
            if (node.else) branches.push({ node: node.else, isElse: true })
            return branches
        }
        case "BinOp":         return node.op === "neg" ? plain(node.left) : plain(node.left, node.right)
        case "PrintString":
        case "Number":
        case "Identifier":
            return []
    }
}

export function renderTree(root: AST.Node): string {
    const lines: string[] = []

    // open[d]: the ancestor at depth d+1 still has siblings below it
    function visit(child: Child, open: boolean[], isLast: boolean, depth: number) {
        const columns = open.map(o => (o ? "|   " : "    ")).join("")
        const branch  = depth === 0 ? "" : isLast ? "+-- " : "|-- "
        lines.push(columns + branch + label(child.node, child.isElse))

        const below = depth === 0 ? open : [...open, !isLast]
        const kids  = children(child.node)
        kids.forEach((kid, idx) => visit(kid, below, idx === kids.length - 1, depth + 1))
    }

    visit({ node: root, isElse: false }, [], true, 0)
    return lines.join("\n")
}

// An empty program draws nothing
export function renderProgram(program: AST.StatementList): string {
    return program.statements.length === 0 ? "" : renderTree(program)
}
