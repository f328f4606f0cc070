import {ICommonLogOptions} from "../../public/options/logging/ICommonLogOptions";

/**
 * Console output options. Everything goes to stderr so that a seed printed on stdout stays clean.
 */
export interface IConsoleLogOptions extends ICommonLogOptions {

    /**
     * Whether to colorize the logs. Only applies to the simple format.
     *
     * Default: true
     */
    colorize?: boolean;
}
