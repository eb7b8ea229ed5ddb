import { defineConfig, type Options } from "tsup";
import path from "path";
import fs from "fs";

type Plugin = NonNullable<Options["esbuildPlugins"]>[number];

const root = path.resolve("../..");

// Resolve @sudokit/* imports to their TypeScript sources; workspace
// packages ship no build output of their own.
const resolveWorkspaceSource: Plugin = {
  name: "resolve-workspace-source",
  setup(build) {
    build.onResolve({ filter: /^@sudokit\// }, (args) => {
      const name = args.path.replace("@sudokit/", "");

      // packages/{name}/src/index.ts
      let srcPath = path.resolve(root, `packages/${name}/src/index.ts`);
      if (fs.existsSync(srcPath)) {
        return { path: srcPath };
      }

      // packages/games/{gameName}/src/index.ts (e.g. @sudokit/game-sudoku)
      if (name.startsWith("game-")) {
        const gameName = name.replace("game-", "");
        srcPath = path.resolve(root, `packages/games/${gameName}/src/index.ts`);
        if (fs.existsSync(srcPath)) {
          return { path: srcPath };
        }
      }

      return undefined;
    });
  },
};

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // Bundle all workspace packages into the output
  noExternal: [/^@sudokit\//],

  banner: {
    js: "#!/usr/bin/env node",
  },

  esbuildOptions(options) {
    options.jsx = "automatic";
  },

  esbuildPlugins: [resolveWorkspaceSource],
});
