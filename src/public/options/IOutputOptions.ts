import {EOutputFormat} from "./EOutputFormat";

/**
 * Where and how the seed is written.
 */
export interface IOutputOptions {

    /**
     * File to write, relative to the working directory. Missing directories are created.
     *
     * Default: print to stdout
     */
    path?: string;

    /**
     * Values: groovy, json
     * Default: groovy
     */
    format?: EOutputFormat;
}
