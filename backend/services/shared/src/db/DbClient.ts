// backend/services/shared/src/db/DbClient.ts
/**
 * Purpose:
 * - Thin, reusable wrapper around a driver-specific IDbFactory.
 * - Owns connection lifecycle + lazy connect; exposes typed helpers.
 *
 * Notes:
 * - Use one DbClient per process (or per data source) and pass it into each
 *   repo at construction time.
 */

import type { Document } from "mongodb";
import { redactUri } from "../env";
import type {
  IDbClientSettings,
  IDbConnectionInfo,
  IDbFactory,
  StoreCollection,
} from "./types";

export class DbClient {
  private readonly factory: IDbFactory;
  private readonly info: IDbConnectionInfo;
  private _connected = false;

  constructor(factory: IDbFactory, info: IDbConnectionInfo) {
    this.factory = factory;
    this.info = info;
  }

  /**
   * Explicit connect (safe to call multiple times).
   */
  public async connect(): Promise<void> {
    if (this._connected && this.factory.isConnected()) return;
    await this.factory.connect(this.info);
    this._connected = this.factory.isConnected();
    if (!this._connected) {
      throw new Error(
        "[DbClient] factory reported not connected after connect()"
      );
    }
  }

  /**
   * Ensure connected before an operation (lazy connect).
   */
  private async ensure(): Promise<void> {
    if (!this._connected || !this.factory.isConnected()) {
      await this.connect();
    }
  }

  public get dbName(): string {
    return this.info.dbName;
  }

  /** Connection target with credentials masked, for log lines. */
  public get target(): string {
    return redactUri(this.info.uri);
  }

  public async getCollection<T extends Document>(
    name: string,
    dbName?: string
  ): Promise<StoreCollection<T>> {
    await this.ensure();
    return this.factory.getCollection<T>(name, dbName ?? this.info.dbName);
  }

  public async runCommand(
    command: Document,
    dbName?: string
  ): Promise<Document> {
    await this.ensure();
    return this.factory.runCommand(dbName ?? this.info.dbName, command);
  }

  public settings(): IDbClientSettings {
    return this.factory.settings();
  }

  /**
   * Close the connection (safe to call multiple times).
   */
  public async close(): Promise<void> {
    await this.factory.close();
    this._connected = false;
  }

  public isConnected(): boolean {
    return this._connected && this.factory.isConnected();
  }
}
