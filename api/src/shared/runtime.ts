import { loadSettings } from "./env";
import { LoggerFactory } from "./logger";

// Resolved once when the worker loads the function modules.
export const settings = loadSettings();

export const loggers = new LoggerFactory(settings.logLevel);
