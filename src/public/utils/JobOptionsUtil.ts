import {IJobPluginParams} from "../plugins/IJobPlugin";
import {ISimpleStore} from "../api/ISimpleStore";

/**
 * Repository coordinates and credentials of a job, falling back to the manifest's `github` section.
 */
export interface IJobCoordinates {
    owner: string | undefined;
    repository: string | undefined;
    apiCredentialsId: string | undefined;
    sshCredentialsId: string | undefined;

    /**
     * The project name, unless the job builds another repository than the project's. Such jobs are named after
     * their own repository.
     */
    projectName: string | undefined;
}

export class JobOptionsUtil {

    static coordinates(params: IJobPluginParams): IJobCoordinates {
        const store: ISimpleStore = params.config.options;
        const credentials: {api?: string; ssh?: string} = params.options.credentials || {};
        const projectRepository: string | undefined = store.getString("github:repository");
        const repository: string | undefined = params.options.repository || projectRepository;

        return {
            owner: params.options.owner || store.getString("github:owner"),
            repository: repository,
            apiCredentialsId: credentials.api || store.getString("github:credentials:api"),
            sshCredentialsId: credentials.ssh || store.getString("github:credentials:ssh"),
            projectName: repository === projectRepository ? params.config.project.name : undefined
        };
    }

    static describe(params: IJobPluginParams): string {
        return "job " + params.key + " (" + params.options.type + ")";
    }
}
