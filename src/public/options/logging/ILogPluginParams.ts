import {IConfig} from "../../api/IConfig";

export interface ILogPluginParams {
    options: object | Array<object>;
    config: IConfig;
    label: string;
}
