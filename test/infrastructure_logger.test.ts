import { describe, it, expect, beforeEach } from "vitest";
import { Logger } from "../src/infrastructure/logger.js";

describe("infrastructure/Logger", () => {
    let lines: string[];
    const destination = {
        write: (msg: string): void => {
            lines.push(msg);
        },
    };

    const entries = (): Record<string, unknown>[] =>
        lines.map((line) => JSON.parse(line) as Record<string, unknown>);

    beforeEach(() => {
        lines = [];
    });

    it("writes structured JSON lines with the context merged in", () => {
        const logger = new Logger({ name: "test-logger" }, destination);
        logger.info("fit computed", { n: 4, slope: 2 });

        const [entry] = entries();
        expect(entry["msg"]).toBe("fit computed");
        expect(entry["level"]).toBe(30);
        expect(entry["name"]).toBe("test-logger");
        expect(entry["n"]).toBe(4);
        expect(entry["slope"]).toBe(2);
    });

    it("drops messages below the configured level", () => {
        const logger = new Logger({ level: "warn" }, destination);
        logger.info("hidden");
        logger.debug("hidden");
        logger.warn("shown");
        logger.error("shown too");

        expect(entries().map((e) => e["level"])).toEqual([40, 50]);
        expect(logger.isDebugEnabled()).toBe(false);
    });

    it("reports debug as enabled at debug level", () => {
        const logger = new Logger({ level: "debug" }, destination);
        logger.debug("visible");
        expect(logger.isDebugEnabled()).toBe(true);
        expect(entries()[0]["level"]).toBe(20);
    });

    it("attaches the registered correlation context", () => {
        const logger = new Logger({}, destination);
        logger.setCorrelationId("req-1", "batch import");
        logger.info("with correlation", {}, "req-1");
        logger.removeCorrelationId("req-1");
        logger.info("after removal", {}, "req-1");

        const [first, second] = entries();
        expect(first["correlationId"]).toBe("req-1");
        expect(first["correlationContext"]).toBe("batch import");
        expect(second["correlationId"]).toBe("req-1");
        expect(second).not.toHaveProperty("correlationContext");
    });

    it("omits correlation fields when no id is given", () => {
        const logger = new Logger({}, destination);
        logger.info("plain");
        expect(entries()[0]).not.toHaveProperty("correlationId");
    });
});
