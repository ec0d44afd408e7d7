import { describe, it, expect, vi } from 'vitest';

import EventBus from '../../../src/core/EventBus';
import { Logger } from '../../../src/utils/Logger';

type TestEvents = {
  test: { value: number };
  other: string;
};

describe('EventBus', () => {
  it('should register and trigger event handlers', () => {
    const eventBus = new EventBus<TestEvents>();
    const handler = vi.fn();

    eventBus.on('test', handler);
    const handled = eventBus.emit('test', { value: 1 });

    expect(handled).toBe(true);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ value: 1 });
  });

  it('should return false when nobody listens', () => {
    const eventBus = new EventBus<TestEvents>();

    expect(eventBus.emit('other', 'data')).toBe(false);
  });

  it('should call handlers in registration order', () => {
    const eventBus = new EventBus<TestEvents>();
    const results: string[] = [];

    eventBus.on('test', () => results.push('first'));
    eventBus.on('test', () => results.push('second'));
    eventBus.emit('test', { value: 1 });

    expect(results).toEqual(['first', 'second']);
  });

  it('should unsubscribe only the registration it was returned for', () => {
    const eventBus = new EventBus<TestEvents>();
    const handler = vi.fn();

    const unsubscribe = eventBus.on('test', handler);
    eventBus.on('test', handler);
    unsubscribe();
    eventBus.emit('test', { value: 1 });

    expect(handler).toHaveBeenCalledTimes(1);

    // 重复取消不影响剩余订阅
    unsubscribe();
    eventBus.emit('test', { value: 2 });

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('should report no listeners once every subscription is removed', () => {
    const eventBus = new EventBus<TestEvents>();
    const unsubscribe = eventBus.on('test', vi.fn());

    unsubscribe();

    expect(eventBus.emit('test', { value: 1 })).toBe(false);
  });

  it('should isolate handler errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const eventBus = new EventBus<TestEvents>();
    const failure = new Error('handler failed');
    const handler = vi.fn();

    eventBus.on('test', () => {
      throw failure;
    });
    eventBus.on('test', handler);

    expect(() => eventBus.emit('test', { value: 1 })).not.toThrow();
    expect(handler).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      '[error] [EventBus] 事件处理器执行错误: test',
      failure
    );
  });

  it('should log through an injected logger', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const eventBus = new EventBus<TestEvents>({ logger: new Logger('Owner') });

    eventBus.on('other', () => {
      throw new Error('handler failed');
    });
    eventBus.emit('other', 'data');

    expect(error.mock.calls[0][0]).toBe('[error] [Owner] 事件处理器执行错误: other');
  });

  it('should not deliver to handlers added during dispatch', () => {
    const eventBus = new EventBus<TestEvents>();
    const late = vi.fn();

    eventBus.on('test', () => {
      eventBus.on('test', late);
    });
    eventBus.emit('test', { value: 1 });

    expect(late).not.toHaveBeenCalled();
  });

  it('should clear all subscriptions', () => {
    const eventBus = new EventBus<TestEvents>();
    const handler = vi.fn();

    eventBus.on('test', handler);
    eventBus.on('other', vi.fn());
    eventBus.clear();

    expect(eventBus.emit('test', { value: 1 })).toBe(false);
    expect(eventBus.emit('other', 'data')).toBe(false);
    expect(handler).not.toHaveBeenCalled();
  });
});
