import * as chai from "chai";
import * as fs from "fs";
import * as path from "path";
import {getSchemaDir, getSchemaFiles} from "./applySchema";

describe("applySchema", () => {
    it("finds the schema files", () => {
        chai.assert.deepEqual(getSchemaFiles(), ["V1__discountRules.sql"]);
    });

    it("only creates tables that don't exist yet", () => {
        const sql = fs.readFileSync(path.join(getSchemaDir(), "V1__discountRules.sql"), "utf8");
        const createStatements = sql.match(/CREATE TABLE[^(]*/g) ?? [];
        chai.assert.deepEqual(createStatements.map(s => s.trim()), [
            "CREATE TABLE IF NOT EXISTS Settings",
            "CREATE TABLE IF NOT EXISTS DiscountRequirements",
            "CREATE TABLE IF NOT EXISTS LocaleStringResources"
        ]);
    });
});
