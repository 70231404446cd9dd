import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

// Subpaths first, so they are matched before their parent packages
const aliases = [
  {
    find: "@steward/agent-runtime-telemetry/logging",
    replacement: path.resolve(rootDir, "packages/agent-runtime-telemetry/src/logging/index.ts"),
  },
  {
    find: "@steward/agent-runtime-telemetry",
    replacement: path.resolve(rootDir, "packages/agent-runtime-telemetry/src/index.ts"),
  },
  {
    find: "@steward/agent-runtime-core",
    replacement: path.resolve(rootDir, "packages/agent-runtime-core/src/index.ts"),
  },
  {
    find: "@steward/agent-runtime-control",
    replacement: path.resolve(rootDir, "packages/agent-runtime-control/src/index.ts"),
  },
  {
    find: "@steward/agent-runtime-tools",
    replacement: path.resolve(rootDir, "packages/agent-runtime-tools/src/index.ts"),
  },
  {
    find: "@steward/agent-runtime-execution",
    replacement: path.resolve(rootDir, "packages/agent-runtime-execution/src/index.ts"),
  },
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: defaultExclude,
    env: {
      STEWARD_LOG_LEVEL: "silent",
    },
    server: {
      deps: {
        inline: [/@steward\/.*/],
      },
    },
  },
});
