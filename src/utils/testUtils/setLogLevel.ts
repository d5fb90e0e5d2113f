/*
 * This file sets the log level to the contents of env var LOG_LEVEL when referenced.
 * It should only be referenced from the command line by the mocha runner.
 */

import * as logPrefix from "loglevel-plugin-prefix";
import log = require("loglevel");

const colors: { [level: string]: string } = {
    "TRACE": "\u001b[0;32m",    // green
    "DEBUG": "\u001b[0;36m",    // cyan
    "INFO": "\u001b[0;34m",     // blue
    "WARN": "\u001b[0;33m",     // yellow
    "ERROR": "\u001b[0;31m"     // red
};

// Prefix log messages with the level.
logPrefix.reg(log);
logPrefix.apply(log, {
    format: (level) => {
        return `${colors[level] ?? ""}[${level}\u001b[0m]`;
    },
});

log.setLevel(getLogLevel());

function getLogLevel(): log.LogLevelDesc {
    switch ((process.env["LOG_LEVEL"] || "").toLowerCase()) {
        case "trace":
            return log.levels.TRACE;
        case "info":
            return log.levels.INFO;
        case "warn":
            return log.levels.WARN;
        case "error":
            return log.levels.ERROR;
        case "silent":
            return log.levels.SILENT;
        default:
            return log.levels.DEBUG;
    }
}
