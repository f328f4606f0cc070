import path = require("path");
import Jobseed, {ISeedResult} from "../../src/main";
import {PluginManager} from "../../src/internal/PluginManager";

const FIXTURES: string = path.resolve(__dirname, "..", "fixtures");

function run(jobseed: Jobseed): Promise<ISeedResult> {
    return new Promise<ISeedResult>((resolve, reject) => {
        jobseed.execute((err?: Error | null, result?: ISeedResult) => {
            if (err) {
                reject(err);
            } else if (!result) {
                reject(new Error("No result"));
            } else {
                resolve(result);
            }
        });
    });
}

describe("PluginManager", () => {
    it("registers the shipped plugins", () => {
        expect(Object.keys(PluginManager.plugins.job)).toEqual(["multibranch-pipeline", "pipeline"]);
        expect(Object.keys(PluginManager.plugins.log)).toEqual(["console", "file"]);
    });

    it("loads plugin modules listed in the manifest, relative to the working directory", async () => {
        const result: ISeedResult = await run(Jobseed.create(FIXTURES).loadObject({
            plugins: ["./custom-job-plugin"],
            project: {name: "ExampleApp"},
            jobs: {nightly: {type: "nightly"}},
            log: {console: {level: "error"}}
        }));

        expect(result.jobs).toEqual(["ExampleApp-deploy"]);
        expect(result.output).toBe("nightlyJob('nightly')\n");
        expect(PluginManager.pluginModules[path.resolve(FIXTURES, "custom-job-plugin")]).toBe(true);
    });

    it("never emits a job whose plan breaks an invariant", async () => {
        await expect(run(Jobseed.create(FIXTURES).loadObject({
            plugins: ["./invalid-job-plugin"],
            project: {name: "ExampleApp"},
            jobs: {
                build: {type: "multibranch-pipeline", repository: "example_app", owner: "example-org",
                    credentials: {api: "test-api", ssh: "test-ssh"}},
                deploy: {type: "main-branch-deploy"}
            },
            log: {console: {level: "error"}}
        }))).rejects.toThrow("Job ExampleApp-deploy is invalid:\n" +
            " - The branch must be remotes/origin/master, found main.");
    });

        it("names modules it cannot find", () => {
        expect(() => PluginManager.load("jobseed-plugin-that-does-not-exist"))
            .toThrow("Cannot find plugin module jobseed-plugin-that-does-not-exist. " +
                "Are you sure you have added it to the package.json file?");
    });

    it("requires a default function", () => {
        const modulePath: string = path.resolve(FIXTURES, "OneHealthTool");
        expect(() => PluginManager.load(modulePath))
            .toThrow("Can't figure out how to load plugin module " + modulePath + ".");
    });
});
