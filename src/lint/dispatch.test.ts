import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { extractDiagnostics, lintFile } from "./dispatch";
import type { CommandResult, CommandRunner } from "./run-command";
import { findToolchain, TOOLCHAINS } from "./toolchains";

let dir: string;

beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "edit-gate-lint-"));
});

afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
});

function completed(output: Partial<{ stdout: string; stderr: string; exitCode: number }>): CommandResult {
    return { kind: "completed", exitCode: output.exitCode ?? 0, stdout: output.stdout ?? "", stderr: output.stderr ?? "" };
}

function fakeRunner(...results: CommandResult[]) {
    const runner = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>();
    for (const result of results) {
        runner.mockResolvedValueOnce(result);
    }
    return runner;
}

describe("findToolchain", () => {
    test("maps extensions to toolchains case-insensitively", () => {
        expect(findToolchain("src/main.rs")?.id).toBe("rust");
        expect(findToolchain("app/VIEWS.PY")?.id).toBe("python");
        expect(findToolchain("web/App.tsx")?.id).toBe("javascript");
        expect(findToolchain("cmd/server.go")?.id).toBe("go");
    });

    test("has no toolchain for other files", () => {
        expect(findToolchain("README.md")).toBeUndefined();
        expect(findToolchain("Main.java")).toBeUndefined();
        expect(findToolchain("Makefile")).toBeUndefined();
    });

    test("uses the documented timeouts", () => {
        const timeouts = Object.fromEntries(TOOLCHAINS.map((toolchain) => [toolchain.id, toolchain.timeoutSeconds]));
        expect(timeouts).toEqual({ rust: 30, python: 10, javascript: 30, go: 30 });
    });
});

describe("extractDiagnostics", () => {
    const rust = TOOLCHAINS[0];

    test("keeps trimmed lines that pass the filter", () => {
        const output = "   Compiling demo v0.1.0\nwarning: unused variable: `x`\n\n  error[E0425]: cannot find value `y`\n";
        expect(extractDiagnostics(output, rust, 10)).toEqual([
            "warning: unused variable: `x`",
            "error[E0425]: cannot find value `y`",
        ]);
    });

    test("stops at maxErrors", () => {
        const output = Array.from({ length: 15 }, (_, i) => `warning: lint ${i}`).join("\n");
        expect(extractDiagnostics(output, rust, 3)).toEqual(["warning: lint 0", "warning: lint 1", "warning: lint 2"]);
    });

    test("returns nothing for a non-positive limit", () => {
        expect(extractDiagnostics("warning: x", rust, 0)).toEqual([]);
    });
});

describe("lintFile", () => {
    test("ignores unsupported extensions without running anything", async () => {
        const runner = fakeRunner();
        expect(await lintFile(join(dir, "notes.md"), 10, runner)).toEqual([]);
        expect(runner).not.toHaveBeenCalled();
    });

    test("skips toolchains whose project root is missing", async () => {
        const runner = fakeRunner();
        expect(await lintFile(join(dir, "main.rs"), 10, runner)).toEqual([]);
        expect(runner).not.toHaveBeenCalled();
    });

    test("runs clippy from the crate root and reads stderr", async () => {
        await writeFile(join(dir, "Cargo.toml"), "[package]\n");
        const runner = fakeRunner(
            completed({
                exitCode: 101,
                stdout: "warning: on stdout is ignored",
                stderr: "    Checking demo\nsrc/main.rs:3:9: warning: unused variable\nsrc/main.rs:7:1: error: expected item\n",
            })
        );

        const diagnostics = await lintFile(join(dir, "src", "main.rs"), 10, runner);

        expect(diagnostics).toEqual(["src/main.rs:3:9: warning: unused variable", "src/main.rs:7:1: error: expected item"]);
        expect(runner).toHaveBeenCalledWith(["cargo", "clippy", "--message-format=short", "--quiet"], {
            cwd: dir,
            timeoutMs: 30_000,
        });
    });

    test("runs eslint on the file and keeps lines with a colon", async () => {
        await writeFile(join(dir, "package.json"), "{}");
        const file = join(dir, "index.ts");
        const runner = fakeRunner(
            completed({
                exitCode: 1,
                stdout: `${file}: line 1, col 7, Error - 'x' is assigned a value but never used. (no-unused-vars)\n\n1 problem\n`,
            })
        );

        expect(await lintFile(file, 10, runner)).toEqual([
            `${file}: line 1, col 7, Error - 'x' is assigned a value but never used. (no-unused-vars)`,
        ]);
        expect(runner).toHaveBeenCalledWith(["npx", "--no-install", "eslint", "--format=compact", file], {
            cwd: dir,
            timeoutMs: 30_000,
        });
    });

    test("truncates go vet lines to 100 characters", async () => {
        await writeFile(join(dir, "go.mod"), "module demo\n");
        const long = `./main.go:4:2: ${"x".repeat(150)}`;
        const runner = fakeRunner(completed({ stderr: `# demo\n${long}\n` }));

        const diagnostics = await lintFile(join(dir, "main.go"), 10, runner);

        expect(diagnostics).toEqual(["# demo", long.slice(0, 100)]);
        expect(diagnostics[1]).toHaveLength(100);
    });

    test("runs flake8 without a project root", async () => {
        const file = join(dir, "app.py");
        const runner = fakeRunner(completed({ exitCode: 1, stdout: `${file}:1:1: F401 'os' imported but unused\n` }));

        expect(await lintFile(file, 10, runner)).toEqual([`${file}:1:1: F401 'os' imported but unused`]);
        expect(runner).toHaveBeenCalledWith(["flake8", "--max-line-length=120", file], {
            cwd: undefined,
            timeoutMs: 10_000,
        });
    });

    test("falls back to py_compile when flake8 is missing", async () => {
        const file = join(dir, "app.py");
        const runner = fakeRunner(
            { kind: "unavailable", reason: "ENOENT" },
            completed({ exitCode: 1, stderr: `  File "${file}", line 2\n    def f(\n         ^\nSyntaxError: '(' was never closed\n` })
        );

        expect(await lintFile(file, 10, runner)).toEqual([
            `File "${file}", line 2`,
            "def f(",
            "^",
            "SyntaxError: '(' was never closed",
        ]);
        expect(runner).toHaveBeenCalledTimes(2);
        expect(runner.mock.calls[1][0]).toEqual(["python3", "-m", "py_compile", file]);
    });

    test("reports a timeout as a single diagnostic", async () => {
        await writeFile(join(dir, "Cargo.toml"), "[package]\n");
        const runner = fakeRunner({ kind: "timeout", stdout: "", stderr: "warning: partial" });

        expect(await lintFile(join(dir, "lib.rs"), 10, runner)).toEqual(["cargo clippy timed out after 30s"]);
    });

    test("swallows a missing tool without a fallback", async () => {
        await writeFile(join(dir, "go.mod"), "module demo\n");
        const runner = fakeRunner({ kind: "unavailable", reason: "ENOENT" });

        expect(await lintFile(join(dir, "main.go"), 10, runner)).toEqual([]);
        expect(runner).toHaveBeenCalledTimes(1);
    });

    test("swallows a runner that throws", async () => {
        const runner = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>();
        runner.mockRejectedValueOnce(new Error("EACCES"));

        expect(await lintFile(join(dir, "app.py"), 10, runner)).toEqual([]);
    });

    test("never returns more than maxErrors lines", async () => {
        const output = Array.from({ length: 25 }, (_, i) => `app.py:${i + 1}:1: E501 line too long`).join("\n");
        const runner = fakeRunner(completed({ stdout: output }));

        expect(await lintFile(join(dir, "app.py"), 4, runner)).toHaveLength(4);
    });
});
