import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["src/**/__tests__/**/*.test.ts"],
        coverage: {
            provider: "v8",
            include: ["src/lib/**/*.ts"],
            exclude: ["src/lib/__tests__/**", "dist/**"],
        },
    },
});
