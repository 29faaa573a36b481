export { loadBuildConfig } from "./buildConfig";
export { ConfigError } from "./configError";
