import { ConditionalCheckFailedException, DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, PutCommand, QueryCommand } from "@aws-sdk/lib-dynamodb";
import type { LedgerRecord } from "../types/build.js";
import type { LedgerConfig } from "../types/config.js";
import type { InsertOutcome, LedgerStore } from "./ledger-store.js";

/**
 * Ledger table with partition key `package` and sort key `requirements_hash`.
 * `package` is a DynamoDB reserved word, hence the attribute-name aliases.
 */
export class DynamoLedgerStore implements LedgerStore {
  constructor(
    private readonly table: string,
    private readonly client: DynamoDBDocumentClient,
  ) {}

  static fromConfig(config: LedgerConfig): DynamoLedgerStore {
    const base = new DynamoDBClient({ region: config.region, endpoint: config.endpoint });
    return new DynamoLedgerStore(config.table, DynamoDBDocumentClient.from(base));
  }

  async count(pkg: string, fingerprint: string): Promise<number> {
    const res = await this.client.send(
      new QueryCommand({
        TableName: this.table,
        KeyConditionExpression: "#pkg = :pkg AND #hash = :hash",
        ExpressionAttributeNames: { "#pkg": "package", "#hash": "requirements_hash" },
        ExpressionAttributeValues: { ":pkg": pkg, ":hash": fingerprint },
        Select: "COUNT",
      }),
    );
    return res.Count ?? res.Items?.length ?? 0;
  }

  async insert(record: LedgerRecord): Promise<InsertOutcome> {
    try {
      await this.client.send(
        new PutCommand({
          TableName: this.table,
          Item: { ...record },
          ConditionExpression: "attribute_not_exists(#pkg)",
          ExpressionAttributeNames: { "#pkg": "package" },
        }),
      );
      return "inserted";
    } catch (e) {
      if (e instanceof ConditionalCheckFailedException) return "duplicate";
      throw e;
    }
  }
}
