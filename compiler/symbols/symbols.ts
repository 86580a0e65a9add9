import { DuplicateDeclarationError, UseBeforeDeclarationError } from "../errors"

// Flat declaration registry, one per compilation. No scopes, no removal.
export class SymbolTable {
    private readonly declared = new Set<string>()

    declare(name: string) {
        if (this.declared.has(name)) throw new DuplicateDeclarationError(name)
        this.declared.add(name)
    }

    isDeclared(name: string): boolean {
        return this.declared.has(name)
    }

    requireDeclared(name: string) {
        if (!this.declared.has(name)) throw new UseBeforeDeclarationError(name)
    }

    // Declaration order
    names(): string[] {
        return [...this.declared]
    }

    get size(): number {
        return this.declared.size
    }
}
