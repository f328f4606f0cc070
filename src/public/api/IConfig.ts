import {ISimpleStore} from "./ISimpleStore";
import {IProject} from "./IProject";
import {ILogger} from "./ILogger";

/**
 * Stores the configuration options that were supplied to jobseed, as well as other derived data.
 */
export interface IConfig {

    /**
     * Stores the supplied configuration options.
     */
    options: ISimpleStore;

    /**
     * This is the directory which we resolve all other relative paths with.
     */
    workingDir: string;

    /**
     * Information about the project the jobs are for.
     */
    project: IProject;

    /**
     * The logger of the run.
     */
    logger: ILogger;

    /**
     * The manifest that was used to load this config. Null if the config was loaded programmatically.
     */
    confFilePath: string | null;
}
