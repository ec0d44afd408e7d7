/**
 * EventBus - 事件总线
 * 提供类型安全的同步事件发布订阅机制
 * 每个处理器独立执行，单个处理器抛错不影响其他处理器和发布方
 */

import { v4 as uuidv4 } from 'uuid';

import { Logger } from '../utils/Logger';

/**
 * 事件处理器类型
 */
export type EventHandler<T> = (data: T) => void;

export interface EventBusOptions {
  /** 日志模块名，未传入 logger 时使用 */
  name?: string;
  logger?: Logger;
}

/**
 * 订阅信息
 */
interface Subscription<T> {
  id: string;
  handler: EventHandler<T>;
}

type SubscriptionMap<Events> = {
  [K in keyof Events]?: Array<Subscription<Events[K]>>;
};

/**
 * 事件总线
 * @typeParam Events 事件名到事件数据类型的映射
 */
export class EventBus<Events extends object> {
  private subscriptions: SubscriptionMap<Events> = {};

  private logger: Logger;

  constructor(options: EventBusOptions = {}) {
    this.logger = options.logger ?? new Logger(options.name ?? 'EventBus');
  }

  /**
   * 订阅事件，按注册顺序分发
   * @returns 取消订阅的函数
   */
  on<K extends keyof Events & string>(
    eventName: K,
    handler: EventHandler<Events[K]>
  ): () => void {
    const subs: Array<Subscription<Events[K]>> =
      this.subscriptions[eventName] ?? [];

    const subscription: Subscription<Events[K]> = { id: uuidv4(), handler };
    subs.push(subscription);
    this.subscriptions[eventName] = subs;

    this.logger.debug(`添加事件订阅: ${eventName}`);

    return () => {
      this.removeSubscription(eventName, subscription.id);
    };
  }

  /**
   * 发布事件
   * @returns 是否有监听器处理了事件
   */
  emit<K extends keyof Events & string>(eventName: K, data: Events[K]): boolean {
    const subs = this.subscriptions[eventName];
    if (!subs || subs.length === 0) {
      return false;
    }

    // 遍历副本，处理器内部的订阅变更不影响本次分发
    for (const sub of [...subs]) {
      try {
        sub.handler(data);
      } catch (error) {
        this.logger.error(`事件处理器执行错误: ${eventName}`, error);
      }
    }

    return true;
  }

  /**
   * 清空所有订阅
   */
  clear(): void {
    this.subscriptions = {};
  }

  private removeSubscription<K extends keyof Events & string>(
    eventName: K,
    id: string
  ): void {
    const subs = this.subscriptions[eventName];
    if (!subs) {
      return;
    }
    const index = subs.findIndex(sub => sub.id === id);
    if (index !== -1) {
      subs.splice(index, 1);
    }
    if (subs.length === 0) {
      delete this.subscriptions[eventName];
    }
  }
}

export default EventBus;
