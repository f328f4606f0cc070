import _ = require("lodash");

const GITHUB_HOST: string = "github.com";

/**
 * GitHub URLs are case-insensitive on the owner; Jenkins compares them as strings, so owners are always lower-cased.
 */
export class GitHubUtil {

    static httpsUrl(owner: string, repository: string): string {
        return "https://" + GITHUB_HOST + "/" + _.toLower(owner) + "/" + repository + ".git";
    }

    static sshUrl(owner: string, repository: string): string {
        return "git@" + GITHUB_HOST + ":" + _.toLower(owner) + "/" + repository + ".git";
    }

    /**
     * one_health_tool -> OneHealthTool
     */
    static projectName(repository: string): string {
        return _.upperFirst(_.camelCase(repository));
    }
}
