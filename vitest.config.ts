import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["src/tests/**/*.test.ts"],
        env: {
            LOG_LEVEL: "error",
        },
    },
});
