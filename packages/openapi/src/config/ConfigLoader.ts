/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `typeshape.yaml` from cwd or a specified path, validates the
 * structure, and merges with defaults.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { DebugObserverFn } from '@typeshape/core';
import { mergeConfig, type SynthesizerConfig, type PartialConfig } from './SynthesizerConfig.js';
import { ConfigValidationError } from './ConfigValidationError.js';

// ── Filename Conventions ─────────────────────────────────

const CONFIG_FILENAMES = [
    'typeshape.yaml',
    'typeshape.yml',
    'typeshape.json',
];

// ── File Schema ──────────────────────────────────────────

const PartialConfigSchema = z.object({
    total: z.boolean(),
    unknownTypes: z.enum(['empty', 'object']),
    refPrefix: z.string(),
    debug: z.boolean(),
    features: z.object({
        readOnly: z.boolean(),
        uniqueItems: z.boolean(),
        descriptions: z.boolean(),
    }).partial().strict(),
    formats: z.object({
        bigint: z.string().min(1),
        date: z.enum(['date-time', 'date']),
        bytes: z.string().min(1),
    }).partial().strict(),
}).partial().strict();

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `typeshape.yaml` in `cwd`
 *   3. Fall back to all defaults
 *
 * An empty file yields the defaults.
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @param debug - Receives a `config` event naming the source used
 * @throws Error when an explicit path does not exist or the file is not valid YAML/JSON
 * @throws ConfigValidationError when the file holds unknown keys or bad values
 */
export function loadConfig(configPath?: string, cwd?: string, debug?: DebugObserverFn): SynthesizerConfig {
    const workDir = cwd ?? process.cwd();

    // 1. Explicit path
    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new Error(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath, debug);
    }

    // 2. Auto-detect
    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate, debug);
        }
    }

    // 3. All defaults
    debug?.({ type: 'config', source: 'defaults', timestamp: Date.now() });
    return mergeConfig({});
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string, debug?: DebugObserverFn): SynthesizerConfig {
    const content = readFileSync(filePath, 'utf-8');

    let raw: unknown = {};
    try {
        if (content.trim() !== '') {
            raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
        }
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`Failed to parse config file "${filePath}": ${reason}`, { cause: err });
    }

    const result = PartialConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigValidationError(filePath, result.error);
    }

    debug?.({ type: 'config', source: filePath, timestamp: Date.now() });
    const partial: PartialConfig = result.data;
    return mergeConfig(partial);
}
