import {ICommonLogOptions} from "../../public/options/logging/ICommonLogOptions";

/**
 * File output options
 */
export interface IFileLogOptions extends ICommonLogOptions {
    /**
     * The file to write to, relative to the working directory.
     *
     * Default: .jobseed/${project slug}.log
     */
    path?: string;

    /**
     * The maximum size of the file, in bytes.
     *
     * Default: 10mb
     */
    maxsize?: number;

    /**
     * The maximum number of files kept once the size is exceeded.
     *
     * Default: 1
     */
    maxFiles?: number;

    /**
     * Whether rotated files are gzipped.
     *
     * Default: false
     */
    zippedArchive?: boolean;
}
