/**
 * A job entry of the manifest's `jobs` section. Values missing here are taken from the `github` and `project`
 * sections.
 */
export interface IJobOptions {
    /**
     * The job plugin to use, e.g. multibranch-pipeline or pipeline (see EJobType). Plugin modules may add more.
     */
    type: string;
    name?: string;
    owner?: string;
    repository?: string;
    credentials?: {
        api?: string;
        ssh?: string;
    };
    "script-path"?: string;

    /**
     * Only used by pipeline jobs.
     */
    "infrastructure-owner"?: string;

    /**
     * Only used by pipeline jobs.
     */
    "infrastructure-repository"?: string;
}
