import { defineConfig } from "tsdown";

export default defineConfig({
    entry: {
        index: "src/index.ts",
    },
    format: ["esm"],
    platform: "node",
    target: "node20",
    outDir: "dist",
    external: ["@elgato-stream-deck/node", "dbus-next", "sharp"],
    treeshake: true,
});
