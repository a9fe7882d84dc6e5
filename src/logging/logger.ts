import { createLogger, type Logger } from "./configLogger.js";

// Debug output can be forced from the environment before any config file is read;
// the CLI raises it again once the config's own `debug` flag is known.
const logger: Logger = createLogger(process.env["DOCSHIFT_DEBUG"] ?? false);

export default logger;
