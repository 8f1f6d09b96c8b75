import { defineConfig } from "tsup";
import pkg from "./package.json" with { type: "json" };

export default defineConfig({
  entry: ["src/index.ts", "src/lib.ts"],
  format: ["esm"],
  target: "node20",
  dts: true,
  clean: true,
  define: {
    PACKAGE_VERSION: JSON.stringify(pkg.version),
  },
});
