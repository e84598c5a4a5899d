import { fileURLToPath } from "url";

/**
 * Runtime configuration for the gate.
 * Everything can be overridden via environment variables.
 */

export type GateConfig = {
    // Checks
    enableStubScan: boolean;
    enableLint: boolean;
    maxErrors: number;

    // Scanning
    maxFileSize: number; // bytes
    patternsPath?: string;

    // Files under this directory never trigger the gate
    hookDir: string;

    debug: boolean;
};

// src/ sits one level below the package root
const PACKAGE_ROOT = fileURLToPath(new URL("..", import.meta.url));

export function parseEnvBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (!value) return defaultValue;
    return value.toLowerCase() === "true" || value === "1";
}

export function parseEnvNumber(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GateConfig {
    return {
        enableStubScan: parseEnvBoolean(env.EDITGATE_STUB_SCAN, true),
        enableLint: parseEnvBoolean(env.EDITGATE_LINT, true),
        maxErrors: Math.max(1, parseEnvNumber(env.EDITGATE_MAX_ERRORS, 10)),

        maxFileSize: parseEnvNumber(
            env.EDITGATE_MAX_FILE_SIZE,
            5 * 1024 * 1024 // 5MB
        ),
        patternsPath: env.EDITGATE_PATTERNS || undefined,

        hookDir: env.EDITGATE_HOOK_DIR || PACKAGE_ROOT,

        debug: parseEnvBoolean(env.EDITGATE_DEBUG, false),
    };
}

// Global config instance
export const config = loadConfig();
