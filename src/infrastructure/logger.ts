// src/infrastructure/logger.ts
import { pino } from "pino";
import type { DestinationStream, Logger as PinoLogger } from "pino";
import type { ILogger } from "./loggerInterface.js";
import type { LoggingConfig } from "../core/config.js";
import { DEFAULT_CONFIG } from "../core/config.js";

type LogLevel = "info" | "error" | "warn" | "debug";

/**
 * Structured pino logger for the regression engine
 */
export class Logger implements ILogger {
    private readonly correlationContext = new Map<string, string>();
    private readonly pino: PinoLogger;

    constructor(
        options: Partial<LoggingConfig> = {},
        destination?: DestinationStream
    ) {
        const { level, pretty, name } = {
            ...DEFAULT_CONFIG.logging,
            ...options,
        };
        const pinoOptions = {
            name,
            level,
            ...(pretty && !destination
                ? { transport: { target: "pino-pretty" } }
                : {}),
        };
        this.pino = destination
            ? pino(pinoOptions, destination)
            : pino(pinoOptions);
    }

    /**
     * Log info level message
     */
    public info(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("info", message, context, correlationId);
    }

    /**
     * Log error level message
     */
    public error(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("error", message, context, correlationId);
    }

    /**
     * Log warning level message
     */
    public warn(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("warn", message, context, correlationId);
    }

    /**
     * Log debug level message
     */
    public debug(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("debug", message, context, correlationId);
    }

    public isDebugEnabled(): boolean {
        return this.pino.isLevelEnabled("debug");
    }

    private log(
        level: LogLevel,
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        const correlation =
            correlationId === undefined
                ? {}
                : {
                      correlationId,
                      correlationContext:
                          this.correlationContext.get(correlationId),
                  };
        this.pino[level]({ ...context, ...correlation }, message);
    }

    /**
     * Set correlation context
     */
    public setCorrelationId(id: string, context: string): void {
        this.correlationContext.set(id, context);
    }

    /**
     * Remove correlation context
     */
    public removeCorrelationId(id: string): void {
        this.correlationContext.delete(id);
    }
}
