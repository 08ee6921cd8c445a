import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — the decoder uses only DataView, TextDecoder and
  // TextEncoder, which browsers and Node.js provide alike.
  platform: "neutral",
});
