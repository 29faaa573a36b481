export { debug, info, warn, error, withContext, describeError } from "./logger";
