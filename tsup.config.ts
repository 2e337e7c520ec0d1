import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The codec touches no Node.js or browser API beyond TextEncoder/TextDecoder.
  platform: "neutral",
});
