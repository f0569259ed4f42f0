import { Notification, QueryResult, QueryResultRow } from 'pg';
import { Subscription } from 'rxjs';

export interface DbDriver {
  open(): Promise<void>;
  close(): Promise<void>;
  execute<R extends QueryResultRow = QueryResultRow>(
    statement: string,
    ...parameters: unknown[]
  ): Promise<QueryResult<R>>;
  listen(topic: string): Promise<void>;
  unlisten(topic: string): Promise<void>;
  onNotification(handler: (notification: Notification) => void): Subscription;
  get connected(): boolean;
}
