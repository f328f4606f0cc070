import async = require("async");
import TransportStream = require("winston-transport");
import {ILogPluginParams} from "../options/logging/ILogPluginParams";

export type ILogPlugin = (params: ILogPluginParams, result: async.AsyncResultCallback<TransportStream[], Error>) => void;
