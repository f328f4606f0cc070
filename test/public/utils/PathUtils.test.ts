import fs = require("fs");
import os = require("os");
import path = require("path");
import {PathUtils} from "../../../src/public/utils/PathUtils";

describe("PathUtils", () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), "jobseed-"));
    });

    afterEach(() => {
        fs.rmSync(root, {recursive: true, force: true});
    });

    describe("searchForPath", () => {
        it("finds the closest match walking upwards", () => {
            fs.mkdirSync(path.resolve(root, "a", "b"), {recursive: true});
            fs.writeFileSync(path.resolve(root, "seed.yaml"), "");
            fs.writeFileSync(path.resolve(root, "a", "seed.yaml"), "");

            expect(PathUtils.searchForPath(path.resolve(root, "a", "b"), "seed.yaml"))
                .toBe(path.resolve(root, "a", "seed.yaml"));
        });

        it("returns null when nothing matches", () => {
            expect(PathUtils.searchForPath(root, "jobseed-missing-" + path.basename(root) + ".yaml")).toBeNull();
        });
    });

    describe("getAsAbsolutePath", () => {
        it("resolves relative paths", () => {
            expect(PathUtils.getAsAbsolutePath("jenkins/dsl.groovy", root))
                .toBe(path.resolve(root, "jenkins", "dsl.groovy"));
        });

        it("keeps absolute paths", () => {
            expect(PathUtils.getAsAbsolutePath("/tmp/dsl.groovy", root)).toBe("/tmp/dsl.groovy");
        });

        it("returns null without a path", () => {
            expect(PathUtils.getAsAbsolutePath(undefined, root)).toBeNull();
            expect(PathUtils.getAsAbsolutePath("", root)).toBeNull();
        });
    });
});
