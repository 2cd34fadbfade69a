import { getConfigFromCli } from "./arg-parser.js";
import type { DeclbindConfig } from "./types.js";

let config: DeclbindConfig | undefined = undefined;

export const getConfig = (): DeclbindConfig => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
