import { DbDriver } from '../types/db.driver.js';
import { Pool, Notification, Client, QueryResult, QueryResultRow } from 'pg';
import { Subject, Subscription } from 'rxjs';
import { Nullable } from '../util/util.types.js';
import { logger } from '../logger/logger.settings.js';
import { JobRuntimeException } from '../exceptions/job.runtime.exception.js';

// Channel names are interpolated into LISTEN statements.
const TOPIC_PATTERN = /^[a-z_][a-z0-9_]*$/;

export class PostgresDbDriver implements DbDriver {
  private connection: Nullable<Pool> = null;
  private notificationClient: Nullable<Client> = null;
  private eventSubject = new Subject<Notification>();

  constructor(private connectionString: string) {}

  get connected(): boolean {
    return this.connection !== null;
  }

  async open(): Promise<void> {
    if (this.connection) {
      return;
    }

    const pool = new Pool({ connectionString: this.connectionString });
    try {
      await pool.query('SELECT 1');
      const client = new Client({ connectionString: this.connectionString });
      await client.connect();
      client.on('notification', (msg) => this.eventSubject.next(msg));
      client.on('error', (error) =>
        logger.error('Notification connection error: ', error),
      );

      this.connection = pool;
      this.notificationClient = client;
    } catch (error) {
      await pool.end();
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.notificationClient) {
      await this.notificationClient.end();
      this.notificationClient = null;
    }

    if (this.connection) {
      await this.connection.end();
      this.connection = null;
    }
  }

  async execute<R extends QueryResultRow = QueryResultRow>(
    statement: string,
    ...parameters: unknown[]
  ): Promise<QueryResult<R>> {
    const pool = this.requireConnection();
    if (parameters.length > 0) {
      return await pool.query<R>(statement, parameters);
    } else {
      return await pool.query<R>(statement);
    }
  }

  async listen(topic: string): Promise<void> {
    await this.requireNotificationClient().query(
      `LISTEN ${this.checkTopic(topic)};`,
    );
  }

  async unlisten(topic: string): Promise<void> {
    await this.requireNotificationClient().query(
      `UNLISTEN ${this.checkTopic(topic)};`,
    );
  }

  onNotification(handler: (notification: Notification) => void): Subscription {
    return this.eventSubject.subscribe(handler);
  }

  private checkTopic(topic: string): string {
    if (!TOPIC_PATTERN.test(topic)) {
      throw new JobRuntimeException(`Invalid notification topic: ${topic}`);
    }
    return topic;
  }

  private requireConnection(): Pool {
    if (!this.connection) {
      throw new JobRuntimeException('Database connection is not open');
    }
    return this.connection;
  }

  private requireNotificationClient(): Client {
    if (!this.notificationClient) {
      throw new JobRuntimeException('Database connection is not open');
    }
    return this.notificationClient;
  }
}
