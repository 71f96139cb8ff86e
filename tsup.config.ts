import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  outDir:   "dist",
  // platform: "neutral" — @bfast/core only touches Uint8Array, DataView,
  // BigInt and TextEncoder/TextDecoder, which browsers and Node.js share.
  platform: "neutral",
});
