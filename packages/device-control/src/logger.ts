import { createLogger } from "@camctl/utils";

/**
 * Device control logger
 * Default sink for library messages when no user log callback is installed
 */
export const deviceLogger = createLogger("device-control");
