/**
 * Inputs of a multibranch build job. Everything that is not here is fixed by jobseed.
 */
export interface IBuildJobOptions {
    owner: string;
    repository: string;

    /**
     * Credential used to scan the repository through the GitHub API.
     */
    apiCredentialsId: string;

    /**
     * Credential used to check out over SSH.
     */
    sshCredentialsId: string;

    /**
     * Default: `${projectName}-build`
     */
    name?: string;

    /**
     * Default: the repository name in PascalCase, e.g. one_health_tool becomes OneHealthTool.
     */
    projectName?: string;

    /**
     * Default: jenkins/Jenkinsfile.build.groovy
     */
    scriptPath?: string;
}
