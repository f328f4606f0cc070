import _ = require("lodash");
import {IJobOptions} from "./options/IJobOptions";
import {IOutputOptions} from "./options/IOutputOptions";
import {ILogOptions} from "./options/logging/ILogOptions";

/**
 * The shape of a jobseed manifest (jobseed.yaml or a JSON file).
 *
 * String values may reference other values with `${section:key}`, e.g. `name: ${project:name}-nightly`.
 */
export interface IManifest {

    /**
     * Plugin modules to require on top of the ones shipped with jobseed. Each module must export a default function
     * that adds its plugins to the registry, see IPluginIndex.
     */
    plugins?: string | string[];

    project?: {

        /**
         * Prefix of the generated job names.
         *
         * Default: the GitHub repository name in PascalCase.
         */
        name?: string;
    };

    /**
     * Defaults shared by every job.
     */
    github?: {
        owner?: string;
        repository?: string;
        credentials?: {

            /**
             * Credential id used for GitHub API scans.
             */
            api?: string;

            /**
             * Credential id used for SSH checkouts.
             */
            ssh?: string;
        };
    };

    /**
     * The jobs to describe, by key. Jobs are written in the order they are declared.
     */
    jobs: _.Dictionary<IJobOptions>;

    output?: IOutputOptions;

    log?: ILogOptions;
}
