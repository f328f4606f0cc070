/**
 * Inputs of a deploy pipeline job.
 */
export interface IDeployJobOptions {
    owner: string;
    repository: string;

    /**
     * The repository holding the deployment scripts. It is checked out as the `origin` remote, and the Jenkinsfile is
     * read from it.
     */
    infrastructureRepository: string;

    /**
     * Default: owner
     */
    infrastructureOwner?: string;

    sshCredentialsId: string;

    /**
     * Default: `${projectName}-deploy`
     */
    name?: string;

    projectName?: string;

    /**
     * Default: jenkinsfiles/ckan_deploy.groovy
     */
    scriptPath?: string;
}
