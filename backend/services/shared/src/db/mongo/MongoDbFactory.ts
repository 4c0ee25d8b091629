// backend/services/shared/src/db/mongo/MongoDbFactory.ts
/**
 * Purpose:
 * - MongoDB-specific factory implementing IDbFactory, to be injected into DbClient.
 * - Pool size and timeouts come from IDbConnectionInfo; nothing is hard-wired.
 */

import { MongoClient, type Db, type Document } from "mongodb";
import type {
  IDbClientSettings,
  IDbConnectionInfo,
  IDbFactory,
  StoreCollection,
} from "../types";

export class MongoDbFactory implements IDbFactory {
  private client: MongoClient | null = null;
  private _connected = false;
  private _settings: IDbClientSettings | null = null;

  public async connect(info: IDbConnectionInfo): Promise<void> {
    if (this._connected && this.client) return;
    const client = new MongoClient(info.uri, {
      maxPoolSize: info.maxPoolSize,
      serverSelectionTimeoutMS: info.serverSelectionTimeoutMS,
      writeConcern: { w: "majority", wtimeoutMS: info.wtimeoutMS },
    });
    await client.connect();
    this.client = client;
    this._connected = true;
    this._settings = {
      maxPoolSize: info.maxPoolSize,
      writeConcern: { w: "majority", wtimeoutMS: info.wtimeoutMS },
    };
  }

  public async close(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.close();
    } finally {
      this.client = null;
      this._connected = false;
    }
  }

  public isConnected(): boolean {
    return this._connected && this.client !== null;
  }

  private getDb(dbName: string): Db {
    if (!this.client) throw new Error("[MongoDbFactory] not connected");
    if (!dbName) throw new Error("[MongoDbFactory] dbName required");
    return this.client.db(dbName);
  }

  public getCollection<T extends Document>(
    name: string,
    dbName: string
  ): StoreCollection<T> {
    return this.getDb(dbName).collection<T>(name);
  }

  public async runCommand(dbName: string, command: Document): Promise<Document> {
    return this.getDb(dbName).command(command);
  }

  public settings(): IDbClientSettings {
    if (!this._settings) throw new Error("[MongoDbFactory] not connected");
    return this._settings;
  }
}
