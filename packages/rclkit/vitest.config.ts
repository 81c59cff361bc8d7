import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/*.spec.ts"],
        environment: "node",
        ui: false,
        testTimeout: 10_000,
        typecheck: {
            enabled: true,
            include: ["src/**/*.spec-d.ts"],
            tsconfig: "./tsconfig.json",
        },
    },
});
