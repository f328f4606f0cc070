import path = require("path");
import fs = require("fs");

export class PathUtils {

    /**
     * Searches for the given relative path starting from the fromDir and walking upwards
     * until the root has been reached.
     *
     * @param {string} fromDir
     * @param {string} searchForRelativePath
     * @returns {string | null}
     */
    static searchForPath(fromDir: string, searchForRelativePath: string): string | null {
        let absolutePath: string = path.resolve(fromDir);
        const rootPath: string = path.parse(absolutePath).root;

        while (absolutePath !== rootPath) {
            const candidate: string = path.resolve(absolutePath, searchForRelativePath);
            if (fs.existsSync(candidate)) {
                return candidate;
            }

            absolutePath = path.resolve(absolutePath, "../");
        }

        // the loop never checks the root itself
        const atRoot: string = path.resolve(rootPath, searchForRelativePath);
        return fs.existsSync(atRoot) ? atRoot : null;
    }

    /**
     * Returns the path as is if it is absolute, otherwise resolves it against relativeDir.
     *
     * @param {string} inputPath
     * @param {string} relativeDir
     * @returns {string | null}
     */
    static getAsAbsolutePath(inputPath: string | null | undefined, relativeDir: string): string | null {
        if (!inputPath) {
            return null;
        } else if (path.isAbsolute(inputPath)) {
            return inputPath;
        } else {
            return path.resolve(relativeDir, inputPath);
        }
    }
}
