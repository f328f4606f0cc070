/**
 * The application whose jobs are described.
 */
export interface IProject {

    /**
     * Used as the prefix of job names, e.g. OneHealthTool gives OneHealthTool-build.
     */
    name: string;

    /**
     * The name, safe for file names.
     */
    slug: string;
}
