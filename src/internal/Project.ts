import getSlug = require("speakingurl");
import {ISimpleStore} from "../public/api/ISimpleStore";
import {IProject} from "../public/api/IProject";
import {GitHubUtil} from "../public/utils/GitHubUtil";

export class Project implements IProject {

    name: string;
    slug: string;

    constructor(store: ISimpleStore) {
        const repository: string | undefined = store.getString("github:repository");
        const name: string | undefined = store.getString("project:name") ||
            (repository ? GitHubUtil.projectName(repository) : undefined);

        if (!name) {
            throw new Error("You did not specify a name for the project. Supply a name for the project with " +
                "project:name, or the repository it is built from with github:repository.");
        }

        this.name = name;
        this.slug = getSlug(this.name);
    }
}
