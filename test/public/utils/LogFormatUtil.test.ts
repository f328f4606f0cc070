import * as Winston from "winston";
import {LogFormatUtil} from "../../../src/public/utils/LogFormatUtil";
import {ELogLevel} from "../../../src/public/options/logging/ELogLevel";
import {ELogOutputFormat} from "../../../src/public/options/logging/ELogOutputFormat";

describe("LogFormatUtil.readCommonOptions", () => {
    it("keeps known values and drops the rest", () => {
        expect(LogFormatUtil.readCommonOptions({level: "debug", format: "json", prettyPrint: true, path: "x.log"}))
            .toEqual({level: ELogLevel.debug, format: ELogOutputFormat.json, prettyPrint: true, timestamp: undefined});
    });

    it("ignores options of the wrong type", () => {
        expect(LogFormatUtil.readCommonOptions({prettyPrint: "yes", timestamp: 0}))
            .toEqual({level: undefined, format: undefined, prettyPrint: undefined, timestamp: undefined});
    });

    it("rejects unknown levels", () => {
        expect(() => LogFormatUtil.readCommonOptions({level: "trace"}))
            .toThrow("Unknown log level trace. Use one of error, warn, info, verbose, debug, silly.");
    });

    it("rejects unknown formats", () => {
        expect(() => LogFormatUtil.readCommonOptions({format: "xml"}))
            .toThrow("Unknown log format xml. Use one of simple, json, logstash.");
    });
});

describe("LogFormatUtil.create", () => {
    // winston keeps the rendered line under this symbol
    const MESSAGE: symbol = Symbol.for("message");

    function render(format: Winston.Logform.Format): string {
        const info: Winston.Logform.TransformableInfo | boolean =
            format.transform({level: "info", message: "Planned pipeline job OneHealthTool-deploy"}, format.options);
        if (typeof info === "boolean") {
            throw new Error("The entry was filtered out");
        }

        return String(Reflect.get(info, MESSAGE));
    }

    it("writes the label and the level", () => {
        expect(render(LogFormatUtil.create({timestamp: false}, "onehealthtool", false)))
            .toBe("[onehealthtool] info: Planned pipeline job OneHealthTool-deploy");
    });

    it("starts simple lines with a timestamp", () => {
        expect(render(LogFormatUtil.create({}, "onehealthtool", false)))
            .toMatch(/^\d{4}-\d{2}-\d{2}T\S+ \[onehealthtool\] info: Planned pipeline job OneHealthTool-deploy$/);
    });

    it("writes json", () => {
        expect(JSON.parse(render(LogFormatUtil.create(
            {format: ELogOutputFormat.json, timestamp: false}, "onehealthtool", true)))).toEqual({
            label: "onehealthtool",
            level: "info",
            message: "Planned pipeline job OneHealthTool-deploy"
        });
    });

    it("adds the timestamp to json entries", () => {
        const entry: {timestamp: string} = JSON.parse(render(LogFormatUtil.create(
            {format: ELogOutputFormat.json}, "onehealthtool", false)));

        expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
    });

    it("pretty prints json", () => {
        expect(render(LogFormatUtil.create(
            {format: ELogOutputFormat.json, prettyPrint: true, timestamp: false}, "onehealthtool", false)))
            .toContain("label: 'onehealthtool'");
    });

    it("writes logstash entries", () => {
        const entry: {"@message": string, "@fields": {label: string, level: string}} = JSON.parse(render(
            LogFormatUtil.create({format: ELogOutputFormat.logstash, timestamp: false}, "onehealthtool", false)));

        expect(entry["@message"]).toBe("Planned pipeline job OneHealthTool-deploy");
        expect(entry["@fields"].label).toBe("onehealthtool");
        expect(entry["@fields"].level).toBe("info");
    });
});
