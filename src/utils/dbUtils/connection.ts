import * as aws from "aws-sdk";
import {Knex, knex} from "knex";
import log = require("loglevel");

let dbCredentials: { username: string, password: string } | null = null;
const isTestEnv = !!process.env["TEST_ENV"];

let knexWriteClient: Knex | null = null;
let knexReadClient: Knex | null = null;

export async function getDbCredentials(): Promise<{ username: string, password: string }> {
    if (dbCredentials) {
        return dbCredentials;
    }

    const username = getEnvVar("DB_USERNAME");
    const testPassword = process.env["DB_PASSWORD"];
    if (isTestEnv && testPassword) {
        // Passing in the DB password through plaintext is only acceptable in testing.
        return dbCredentials = {
            username,
            password: testPassword
        };
    }

    const passwordParameter = getEnvVar("DB_PASSWORD_PARAMETER");
    const ssm = new aws.SSM({
        apiVersion: "2014-11-06",
        credentials: new aws.EnvironmentCredentials("AWS"),
        region: getEnvVar("AWS_REGION")
    });

    log.info("fetching db credentials");
    const resp = await ssm.getParameter({
        Name: passwordParameter,
        WithDecryption: true
    }).promise();

    if (!resp.Parameter || resp.Parameter.Value == null) {
        throw new Error(`Could not find SSM parameter ${passwordParameter}`);
    }
    log.info("got db credentials");

    return dbCredentials = {
        username,
        password: resp.Parameter.Value
    };
}

/**
 * Get a read/write Knex instance.  This instance holds a connection pool that releases
 * connections when the process is shut down.
 */
export async function getKnexWrite(): Promise<Knex> {
    if (knexWriteClient) {
        return knexWriteClient;
    }

    const credentials = await getDbCredentials();
    return knexWriteClient = getKnex(credentials.username, credentials.password, getEnvVar("DB_ENDPOINT"), getEnvVar("DB_PORT"));
}

/**
 * Get a read only Knex instance.  This instance holds a connection pool that releases
 * connections when the process is shut down.
 */
export async function getKnexRead(): Promise<Knex> {
    if (knexReadClient) {
        return knexReadClient;
    }

    const credentials = await getDbCredentials();
    return knexReadClient = getKnex(credentials.username, credentials.password, getEnvVar("DB_READ_ENDPOINT"), getEnvVar("DB_PORT"));
}

export function getDbName(): string {
    return process.env["DB_NAME"] || "discountrules";
}

function getKnex(username: string, password: string, endpoint: string, port: string): Knex {
    log.info(`connecting to ${endpoint}:${port}`);
    return knex({
        // debug: true,     // uncomment to dump very verbose SQL statement info to console.log
        client: "mysql2",
        connection: {
            host: endpoint,
            port: +port,
            user: username,
            password: password,
            database: getDbName(),
            timezone: "Z"
        },
        pool: {
            min: 1,
            max: 1
        }
    });
}

/**
 * Get the value of the given environment variable or throw an Error if it's missing.
 */
export function getEnvVar(envVar: string): string {
    const value = process.env[envVar];
    if (!value) {
        throw new Error(`env var ${envVar} not set`);
    }
    return value;
}
