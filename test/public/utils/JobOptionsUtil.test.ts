import {JobOptionsUtil, IJobCoordinates} from "../../../src/public/utils/JobOptionsUtil";
import {IJobOptions} from "../../../src/public/options/IJobOptions";
import {IConfig} from "../../../src/public/api/IConfig";
import {testConfig} from "../../fixtures/TestConfig";

describe("JobOptionsUtil.coordinates", () => {
    let config: IConfig;

    function coordinates(options: IJobOptions): IJobCoordinates {
        return JobOptionsUtil.coordinates({key: "build", options: options, config: config});
    }

    beforeEach(() => {
        config = testConfig(process.cwd());
        config.options.set("github", {
            owner: "Fjelltopp",
            repository: "one_health_tool",
            credentials: {api: "jenkins_github_api", ssh: "jenkins_github_ssh"}
        });
    });

    it("falls back to the github section", () => {
        expect(coordinates({type: "multibranch-pipeline", credentials: {ssh: "test-ssh"}})).toEqual({
            owner: "Fjelltopp",
            repository: "one_health_tool",
            apiCredentialsId: "jenkins_github_api",
            sshCredentialsId: "test-ssh",
            projectName: "OneHealthTool"
        });
    });

    it("uses the project name for the project's repository", () => {
        expect(coordinates({type: "pipeline", repository: "one_health_tool"}).projectName).toBe("OneHealthTool");
    });

    it("leaves the name of other repositories to their jobs", () => {
        const result: IJobCoordinates = coordinates({type: "pipeline", owner: "example-org", repository: "data_tools"});

        expect(result.owner).toBe("example-org");
        expect(result.repository).toBe("data_tools");
        expect(result.projectName).toBeUndefined();
    });

    it("describes the job", () => {
        expect(JobOptionsUtil.describe({key: "deploy", options: {type: "pipeline"}, config: config}))
            .toBe("job deploy (pipeline)");
    });
});
