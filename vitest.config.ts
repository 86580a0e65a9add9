import { defineConfig } from "vitest/config"

export default defineConfig({
    test: {
        include: ["compiler/**/*.test.ts", "cli/**/*.test.ts"],
        environment: "node",
    },
})
