import { Subject, Subscription } from 'rxjs';
import { DbDriver } from './types/db.driver.js';
import { Notification } from 'pg';
import { Nullable } from './util/util.types.js';
import { logger } from './logger/logger.settings.js';

export enum NotificationTopic {
  NotificationTopicInsert = 'forensics_job_insert',
}

export type NotifyFunction = (notification: DbNotification) => void;

export interface DbNotification {
  topic: NotificationTopic;
  payload: string;
}

export class Notifier {
  private driverSubscription: Nullable<Subscription> = null;
  private jobInsertSubject = new Subject<DbNotification>();

  constructor(private driver: DbDriver) {}

  async start(): Promise<void> {
    logger.info('Starting notifier');
    if (!this.driverSubscription) {
      this.driverSubscription = this.driver.onNotification(
        this.notificationHandler,
      );

      await this.driver.listen(NotificationTopic.NotificationTopicInsert);
    }
  }

  private notificationHandler = (notification: Notification) => {
    const { payload, channel } = notification;

    const topic = Object.values(NotificationTopic).find((x) => x === channel);

    if (topic === NotificationTopic.NotificationTopicInsert) {
      this.jobInsertSubject.next({ topic, payload: payload ?? '' });
    }
  };

  async stop(): Promise<void> {
    logger.info('Stopping notifier');
    if (this.driverSubscription) {
      this.driverSubscription.unsubscribe();
      this.driverSubscription = null;
      await this.driver.unlisten(NotificationTopic.NotificationTopicInsert);
    }
  }

  onJobInsert(handler: NotifyFunction): Subscription {
    return this.jobInsertSubject.subscribe(handler);
  }
}
