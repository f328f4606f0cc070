import nconf = require("nconf");
import uuid = require("uuid");
import {SimpleStore} from "../../src/internal/SimpleStore";
import {getAllConfigVarDependencies, resolveConfigVars} from "../../src/internal/ConfigResolver";

function resolve(store: SimpleStore, sections: string[]): Error | null {
    let result: Error | null = null;
    resolveConfigVars(store, sections, (err?: Error | null) => {
        result = err || null;
    });
    return result;
}

describe("resolveConfigVars", () => {
    let store: SimpleStore;

    beforeAll(() => {
        nconf.use("memory");
    });

    beforeEach(() => {
        store = new SimpleStore(uuid.v4());
    });

    it("substitutes references inside strings", () => {
        store.set("project", {name: "OneHealthTool"});
        store.set("jobs", {build: {name: "${project:name}-build", type: "multibranch-pipeline"}});

        expect(resolve(store, ["project", "jobs"])).toBeNull();
        expect(store.get("jobs:build:name")).toBe("OneHealthTool-build");
    });

    it("follows chains of references", () => {
        store.set("a", {x: "${b:y}/${b:y}"});
        store.set("b", {y: "${c:z}", n: 3});
        store.set("c", {z: "deep-${b:n}"});

        expect(resolve(store, ["a"])).toBeNull();
        expect(store.get("a:x")).toBe("deep-3/deep-3");
        expect(store.get("b:y")).toBe("deep-3");
    });

    it("copies non-string values referenced on their own", () => {
        store.set("github", {credentials: {api: "test-api", ssh: "test-ssh"}});
        store.set("jobs", {build: {credentials: "${github:credentials}"}});

        expect(resolve(store, ["jobs"])).toBeNull();
        expect(store.get("jobs:build:credentials")).toEqual({api: "test-api", ssh: "test-ssh"});
    });

    it("resolves inside arrays", () => {
        store.set("project", {name: "App"});
        store.set("list", ["${project:name}-a", "plain"]);

        expect(resolve(store, ["list"])).toBeNull();
        expect(store.get("list")).toEqual(["App-a", "plain"]);
    });

    it("fails on unresolvable references", () => {
        store.set("jobs", {build: {name: "${project:name}-build"}});

        expect(resolve(store, ["jobs"])).toEqual(
            new Error("The variable ${project:name} used in jobs:build:name cannot be resolved."));
    });

    it("fails on circular references", () => {
        store.set("a", {x: "${a:y}", y: "${a:x}"});

        expect(resolve(store, ["a"])).toEqual(new Error("Circular dependency detected (variable a:x)."));
    });

    it("refuses to embed objects in strings", () => {
        store.set("github", {credentials: {ssh: "test-ssh"}});
        store.set("jobs", {name: "prefix-${github:credentials}"});

        expect(resolve(store, ["jobs"])).toEqual(new Error(
            "The variable ${github:credentials} used in jobs:name is not a plain value and cannot be embedded in a string."));
    });
});

describe("getAllConfigVarDependencies", () => {
    it("lists each reference once", () => {
        expect(getAllConfigVarDependencies("${a:b}-${c}-${a:b}")).toEqual(["a:b", "c"]);
    });

    it("ignores dollars without braces and unterminated references", () => {
        expect(getAllConfigVarDependencies("$HOME ${open")).toEqual([]);
        expect(getAllConfigVarDependencies("")).toEqual([]);
    });
});
