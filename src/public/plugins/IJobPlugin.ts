import {IJobSpec} from "../model/IJobSpec";
import {IJobOptions} from "../options/IJobOptions";
import {IConfig} from "../api/IConfig";
import {ILogger} from "../api/ILogger";
import {DslWriter} from "../dsl/DslWriter";

export interface IJobPluginParams {

    /**
     * The key of the job under the `jobs` section.
     */
    key: string;

    options: IJobOptions;

    config: IConfig;
}

export interface IJobPluginInstance {

    /**
     * The planned job. It must be immutable and depend only on the plugin params.
     */
    spec: IJobSpec;

    /**
     * Writes the job as Job DSL.
     */
    emit(writer: DslWriter): void;
}

/**
 * Each Job plugin needs to implement this to create a plugin instance.
 */
export type IJobPlugin = (params: IJobPluginParams, logger: ILogger) => IJobPluginInstance;
