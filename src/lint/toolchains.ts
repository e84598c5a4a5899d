import { extname } from "path";
import type { ToolchainSpec } from "./types";

const anyLine = (): boolean => true;

export const TOOLCHAINS: readonly ToolchainSpec[] = [
  {
    id: "rust",
    name: "cargo clippy",
    extensions: [".rs"],
    rootMarkers: ["Cargo.toml"],
    requiresRoot: true,
    argv: ["cargo", "clippy", "--message-format=short", "--quiet"],
    timeoutSeconds: 30,
    outputStream: "stderr",
    lineFilter: (line) => /error|warning/i.test(line),
    maxLineLength: 200,
  },
  {
    id: "python",
    name: "flake8",
    extensions: [".py"],
    rootMarkers: [],
    requiresRoot: false,
    argv: ["flake8", "--max-line-length=120", "{file}"],
    timeoutSeconds: 10,
    outputStream: "stdout",
    lineFilter: anyLine,
    maxLineLength: 200,
    // Compile errors only, when flake8 is missing.
    fallback: {
      name: "py_compile",
      argv: ["python3", "-m", "py_compile", "{file}"],
      timeoutSeconds: 10,
      outputStream: "stderr",
      lineFilter: anyLine,
      maxLineLength: 200,
    },
  },
  {
    id: "javascript",
    name: "eslint",
    extensions: [".js", ".jsx", ".ts", ".tsx", ".mjs", ".cjs"],
    rootMarkers: [
      "package.json",
      "eslint.config.js",
      "eslint.config.mjs",
      ".eslintrc",
      ".eslintrc.js",
      ".eslintrc.json",
    ],
    requiresRoot: true,
    argv: ["npx", "--no-install", "eslint", "--format=compact", "{file}"],
    timeoutSeconds: 30,
    outputStream: "stdout",
    // compact format puts "path: line N, col M, ..." on every problem line
    lineFilter: (line) => line.includes(":"),
    maxLineLength: 200,
  },
  {
    id: "go",
    name: "go vet",
    extensions: [".go"],
    rootMarkers: ["go.mod"],
    requiresRoot: true,
    argv: ["go", "vet", "./..."],
    timeoutSeconds: 30,
    outputStream: "stderr",
    lineFilter: anyLine,
    maxLineLength: 100,
  },
];

const BY_EXTENSION = new Map<string, ToolchainSpec>(
  TOOLCHAINS.flatMap((toolchain) => toolchain.extensions.map((ext) => [ext, toolchain] as const))
);

export function findToolchain(filePath: string): ToolchainSpec | undefined {
  return BY_EXTENSION.get(extname(filePath).toLowerCase());
}
