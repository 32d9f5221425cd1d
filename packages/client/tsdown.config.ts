import type { Options } from "tsdown"

const config: Options = {
  entry: ["src/index.ts"],
  format: ["esm"],
  platform: "node",
  target: "node20",
  dts: true,
  clean: true,
}

export default config
