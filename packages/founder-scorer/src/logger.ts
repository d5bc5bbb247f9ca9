import { createLogger } from "@founder-finder/utils";

const logger = createLogger("founder-scorer");

export default logger;
