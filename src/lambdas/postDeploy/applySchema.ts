import * as awslambda from "aws-lambda";
import * as fs from "fs";
import * as mysql from "mysql2/promise";
import * as path from "path";
import {getDbCredentials, getDbName, getEnvVar} from "../../utils/dbUtils/connection";
import log = require("loglevel");

/**
 * Create the tables the stores read and write.  Every statement is idempotent.
 */
export async function applySchema(ctx: awslambda.Context): Promise<void> {
    log.info("waiting for database to be connectable");
    const connection = await getConnection(ctx);
    try {
        const dbName = getDbName();
        await connection.query(`CREATE DATABASE IF NOT EXISTS \`${dbName}\``);
        await connection.query(`USE \`${dbName}\``);

        for (const file of getSchemaFiles()) {
            log.info("applying", file);
            await connection.query(fs.readFileSync(path.join(getSchemaDir(), file), "utf8"));
        }
    } finally {
        await connection.end();
    }
}

export function getSchemaDir(): string {
    return path.join(__dirname, "schema");
}

/**
 * The .sql files of the schema dir in version order.
 */
export function getSchemaFiles(): string[] {
    return fs.readdirSync(getSchemaDir())
        .filter(file => /^V\d+__.*\.sql$/.test(file))
        .sort((a, b) => getSchemaVersion(a) - getSchemaVersion(b));
}

function getSchemaVersion(file: string): number {
    return parseInt(file.substring(1), 10);
}

async function getConnection(ctx: awslambda.Context): Promise<mysql.Connection> {
    const credentials = await getDbCredentials();
    const host = getEnvVar("DB_ENDPOINT");
    const port = getEnvVar("DB_PORT");

    while (true) {
        try {
            log.info(`connecting to ${host}:${port}`);
            return await mysql.createConnection({
                // multipleStatements = true removes a protection against injection attacks.
                // We're running our own schema files and not accepting user input here so that's ok.
                multipleStatements: true,
                host,
                port: +port,
                user: credentials.username,
                password: credentials.password,
                timezone: "Z"
            });
        } catch (err) {
            log.error("error connecting to database", err);
            if (isRetryableConnectionError(err) && ctx.getRemainingTimeInMillis() > 60000) {
                log.info("retrying...");
            } else {
                throw err;
            }
        }
    }
}

function isRetryableConnectionError(err: unknown): boolean {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    return code === "ETIMEDOUT" || code === "ENOTFOUND";
}
