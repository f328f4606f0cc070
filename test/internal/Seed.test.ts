import {readJobOptions} from "../../src/internal/Seed";

describe("readJobOptions", () => {
    it("reads a job entry", () => {
        expect(readJobOptions("deploy", {
            type: "pipeline",
            credentials: {ssh: "test-ssh"},
            "infrastructure-repository": "fjelltopp-infrastructure"
        })).toEqual({
            type: "pipeline",
            name: undefined,
            owner: undefined,
            repository: undefined,
            credentials: {api: undefined, ssh: "test-ssh"},
            "script-path": undefined,
            "infrastructure-owner": undefined,
            "infrastructure-repository": "fjelltopp-infrastructure"
        });
    });

    it("turns numbers into strings", () => {
        expect(readJobOptions("build", {type: "multibranch-pipeline", repository: 2020}).repository).toBe("2020");
    });

    it("requires an object", () => {
        expect(() => readJobOptions("build", "multibranch-pipeline"))
            .toThrow("The job build must be an object with at least a type.");
    });

    it("requires a type", () => {
        expect(() => readJobOptions("build", {name: "OneHealthTool-build"}))
            .toThrow("The job build has no type. Set jobs:build:type.");
    });

    it("rejects options that are not strings", () => {
        expect(() => readJobOptions("build", {type: "multibranch-pipeline", owner: ["a"]}))
            .toThrow("The option jobs:build:owner must be a string.");
        expect(() => readJobOptions("build", {type: "multibranch-pipeline", credentials: "test-api"}))
            .toThrow("The option jobs:build:credentials must be an object with api and ssh.");
        expect(() => readJobOptions("build", {type: "multibranch-pipeline", credentials: {api: 1}}))
            .toThrow("The option jobs:build:credentials:api must be a string.");
    });
});
