import { fileURLToPath } from "node:url"
import { defineConfig, defineProject } from "vitest/config"

const alias = {
  "@surgekit/client": fileURLToPath(
    new URL("./packages/client/src/index.ts", import.meta.url)
  ),
}

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: "client",
          include: ["packages/client/test/**/*.test.ts"],
          exclude: ["**/node_modules/**"],
          testTimeout: 15000,
        },
        resolve: { alias },
      }),
      defineProject({
        test: {
          name: "cli",
          include: ["packages/cli/test/**/*.test.ts"],
          exclude: ["**/node_modules/**"],
        },
        resolve: { alias },
      }),
    ],
  },
})
