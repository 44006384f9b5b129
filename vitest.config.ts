import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["server/src/**/*.test.ts"],
        clearMocks: true,
    },
});
