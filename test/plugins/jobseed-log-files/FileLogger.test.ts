import fs = require("fs");
import os = require("os");
import path = require("path");
import * as Winston from "winston";
import TransportStream = require("winston-transport");
import {fileLogger} from "../../../src/plugins/jobseed-log-files/FileLogger";
import {testConfig} from "../../fixtures/TestConfig";

describe("fileLogger", () => {
    let workingDir: string;
    let transports: TransportStream[];

    function create(options: object | Array<object>): Error | null {
        let error: Error | null = null;
        fileLogger({options: options, config: testConfig(workingDir), label: "onehealthtool"},
            (err?: Error | null, result?: TransportStream[]) => {
                error = err || null;
                transports = result || [];
            });
        return error;
    }

    function fileTransport(index: number): Winston.transports.FileTransportInstance {
        const transport: TransportStream = transports[index];
        if (!(transport instanceof Winston.transports.File)) {
            throw new Error("Expected a file transport");
        }
        return transport;
    }

    beforeEach(() => {
        workingDir = fs.mkdtempSync(path.join(os.tmpdir(), "jobseed-"));
        transports = [];
    });

    afterEach(() => {
        transports.forEach((transport: TransportStream) => transport.close && transport.close());
        fs.rmSync(workingDir, {recursive: true, force: true});
    });

    it("logs to .jobseed/<project>.log by default", () => {
        expect(create({})).toBeNull();
        expect(transports).toHaveLength(1);
        expect(fileTransport(0).dirname).toBe(path.resolve(workingDir, ".jobseed"));
        expect(fileTransport(0).filename).toBe("onehealthtool.log");
        expect(fileTransport(0).level).toBe("info");
        expect(fileTransport(0).maxsize).toBe(10 * 1024 * 1024);
    });

    it("resolves the path against the working directory", () => {
        expect(create({path: "logs/seed.log", level: "debug", maxsize: 1024})).toBeNull();
        expect(fileTransport(0).dirname).toBe(path.resolve(workingDir, "logs"));
        expect(fileTransport(0).filename).toBe("seed.log");
        expect(fileTransport(0).level).toBe("debug");
        expect(fileTransport(0).maxsize).toBe(1024);
    });

    it("creates one transport per entry", () => {
        expect(create([{path: "a.log"}, {path: "b.log", level: "error"}])).toBeNull();
        expect(transports).toHaveLength(2);
        expect(fileTransport(1).filename).toBe("b.log");
        expect(fileTransport(1).level).toBe("error");
    });

    it("rejects unknown levels", () => {
        expect(create({level: "loud"})).toEqual(
            new Error("Unknown log level loud. Use one of error, warn, info, verbose, debug, silly."));
        expect(transports).toEqual([]);
    });
});
