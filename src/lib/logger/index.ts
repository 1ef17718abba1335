/**
 * Tiny structured logger with namespaces and an optional log-file sink.
 *
 * Env:
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=smart   -> service tag (optional)
 *
 * The file sink receives the same lines as the console once
 * `attachLogFile()` has been called.
 */

import { appendFileSync, mkdirSync } from "fs";
import path from "path";

type LevelName = "trace" | "debug" | "info" | "warn" | "error";

type LevelMap = Record<LevelName, number>;

export interface LogMeta {
    [key: string]: unknown;
    error?: unknown;
    err?: unknown;
}

export interface Logger {
    trace(message: unknown, meta?: LogMeta): void;
    debug(message: unknown, meta?: LogMeta): void;
    info(message: unknown, meta?: LogMeta): void;
    warn(message: unknown, meta?: LogMeta): void;
    error(message: unknown, meta?: LogMeta): void;
    child(namespace: string | string[]): Logger;
}

const LEVELS: LevelMap = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

function isLevelName(value: string): value is LevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function resolveMinLevel(raw: string | undefined): number {
    const name = (raw || "info").toLowerCase();
    return isLevelName(name) ? LEVELS[name] : LEVELS.info;
}

const ENABLED = process.env.LOG_ENABLED !== "0";
const MIN_LEVEL = resolveMinLevel(process.env.LOG_LEVEL);
const AS_JSON = process.env.LOG_JSON === "1";
const SERVICE = process.env.LOG_SERVICE_NAME || "";

let logFilePath: string | undefined;

/**
 * Mirror every log line into `filePath` (appended). The parent directory is
 * created when missing.
 */
export function attachLogFile(filePath: string): void {
    mkdirSync(path.dirname(filePath), { recursive: true });
    logFilePath = filePath;
}

export function detachLogFile(): void {
    logFilePath = undefined;
}

function levelName(value: number): LevelName {
    const entry = Object.entries(LEVELS).find(([, v]) => v === value);
    return entry && isLevelName(entry[0]) ? entry[0] : "info";
}

export function serializeError(err: unknown): unknown {
    if (!err) return undefined;
    if (err instanceof Error) {
        const extra: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(err)) {
            if (key === "message" || key === "name" || key === "stack") continue;
            extra[key] = value;
        }
        return {
            message: err.message,
            stack: err.stack,
            name: err.name,
            ...extra,
        };
    }
    return err;
}

function safeStringify(obj: unknown): string {
    try {
        return JSON.stringify(obj);
    } catch {
        return '{"_":"[unserializable]"}';
    }
}

function joinNamespace(ns?: string | string[]): string {
    if (!ns) return "";
    if (Array.isArray(ns)) return ns.filter(Boolean).join(":");
    return String(ns);
}

function emit(levelValue: number, line: string): void {
    if (levelValue >= LEVELS.error) {
        console.error(line);
    } else if (levelValue >= LEVELS.warn) {
        console.warn(line);
    } else {
        console.log(line);
    }
    if (logFilePath) {
        appendFileSync(logFilePath, `${line}\n`);
    }
}

function baseLog({ ns }: { ns?: string | string[] }): Logger {
    const namespace = joinNamespace(ns);

    const write = (levelValue: number, msg: unknown, meta?: LogMeta) => {
        if (!ENABLED || levelValue < MIN_LEVEL) return;

        const lvl = levelName(levelValue);
        const cleanMeta = meta
            ? {
                  ...meta,
                  ...(meta.error ? { error: serializeError(meta.error) } : {}),
                  ...(meta.err ? { err: serializeError(meta.err) } : {}),
              }
            : undefined;
        const payload = {
            ts: new Date().toISOString(),
            level: lvl,
            ns: namespace || undefined,
            service: SERVICE || undefined,
            pid: process.pid,
            msg: String(msg ?? ""),
            ...(cleanMeta ? { meta: cleanMeta } : {}),
        };

        if (AS_JSON) {
            emit(levelValue, safeStringify(payload));
            return;
        }

        const tags = [
            `[${payload.ts}]`,
            SERVICE && `[${SERVICE}]`,
            `[${lvl.toUpperCase()}]`,
            namespace && `[${namespace}]`,
        ]
            .filter(Boolean)
            .join(" ");

        const tail = payload.meta ? ` ${safeStringify(payload.meta)}` : "";
        emit(levelValue, `${tags} ${payload.msg}${tail}`);
    };

    const child = (subNs: string | string[]): Logger => {
        const next = Array.isArray(subNs) ? subNs : [String(subNs)];
        const merged = namespace ? [namespace, ...next] : next;
        return baseLog({ ns: merged });
    };

    return {
        trace: (m, meta) => write(LEVELS.trace, m, meta),
        debug: (m, meta) => write(LEVELS.debug, m, meta),
        info: (m, meta) => write(LEVELS.info, m, meta),
        warn: (m, meta) => write(LEVELS.warn, m, meta),
        error: (m, meta) => write(LEVELS.error, m, meta),
        child,
    };
}

const logger = baseLog({ ns: "" });

export default logger;
