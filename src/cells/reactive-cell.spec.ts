import { expect, it, vi } from 'vitest';
import { EventBus } from '../events/event-bus';
import { PropertyChangedEvent } from '../events/property-events';
import { PropertyStore } from '../store';
import { captureLogs } from '../testing/log-capture';
import { QueuedThreadMarshaller } from '../threading';
import { ReactiveCell } from './reactive-cell';

const logs = captureLogs();

it('should not fire on subscribe', () => {
  const countCell = new ReactiveCell(0);
  const callback = vi.fn();
  countCell.subscribe(callback);
  expect(callback).not.toHaveBeenCalled();
});

it('should notify once with the old and new value', () => {
  const countCell = new ReactiveCell(0);
  countCell.set(1);
  const callback = vi.fn();
  countCell.subscribeWithOldValue(callback);
  countCell.set(2);
  expect(callback).toHaveBeenCalledTimes(1);
  expect(callback).toHaveBeenCalledWith(1, 2);
});

it('should not notify when the value is the same', () => {
  const countCell = new ReactiveCell(1);
  const callback = vi.fn();
  countCell.subscribe(callback);
  countCell.set(1);
  expect(callback).not.toHaveBeenCalled();
});

it('should notify an equal value once when forced', () => {
  const countCell = new ReactiveCell(1);
  const callback = vi.fn();
  countCell.subscribeWithOldValue(callback);
  countCell.set(1, true);
  expect(callback).toHaveBeenCalledTimes(1);
  expect(callback).toHaveBeenCalledWith(1, 1);
});

it('should deliver to all subscriber shapes in subscription order', () => {
  const nameCell = new ReactiveCell('ada');
  const calls: unknown[][] = [];
  nameCell.subscribe((value) => calls.push(['typed', value]));
  nameCell.subscribeBoxed((value) => calls.push(['boxed', value]));
  nameCell.subscribeWithOldValue((oldValue, newValue) =>
    calls.push(['change', oldValue, newValue])
  );
  nameCell.set('grace');
  expect(calls).toEqual([
    ['typed', 'grace'],
    ['boxed', 'grace'],
    ['change', 'ada', 'grace']
  ]);
});

it('should fire with the current value when fireOnSubscribe is set', () => {
  const countCell = new ReactiveCell(7);
  const typed = vi.fn();
  const change = vi.fn();
  countCell.subscribe(typed, { fireOnSubscribe: true });
  countCell.subscribeWithOldValue(change, { fireOnSubscribe: true });
  expect(typed).toHaveBeenCalledWith(7);
  expect(change).toHaveBeenCalledWith(7, 7);
});

it('should never call a disposed subscription', () => {
  const countCell = new ReactiveCell(0);
  const removed = vi.fn();
  const kept = vi.fn();
  const unsubscribe = countCell.subscribe(removed);
  countCell.subscribe(kept);
  unsubscribe();
  unsubscribe();
  countCell.set(1);
  expect(removed).not.toHaveBeenCalled();
  expect(kept).toHaveBeenCalledWith(1);
  expect(countCell.subscriberCount).toBe(1);
});

it('should skip a subscriber removed by an earlier one during notification', () => {
  const countCell = new ReactiveCell(0);
  const later = vi.fn();
  let unsubscribeLater: () => void = () => {};
  countCell.subscribe(() => unsubscribeLater());
  unsubscribeLater = countCell.subscribe(later);
  countCell.set(1);
  expect(later).not.toHaveBeenCalled();
  expect(countCell.subscriberCount).toBe(1);
});

it('should not call a subscriber added during notification until the next change', () => {
  const countCell = new ReactiveCell(0);
  const added = vi.fn();
  const unsubscribe = countCell.subscribe(() => {
    countCell.subscribe(added);
    unsubscribe();
  });
  countCell.set(1);
  expect(added).not.toHaveBeenCalled();
  countCell.set(2);
  expect(added).toHaveBeenCalledTimes(1);
  expect(added).toHaveBeenCalledWith(2);
});

it('should keep notifying when a subscriber throws', () => {
  const countCell = new ReactiveCell(0);
  const after = vi.fn();
  countCell.subscribe(() => {
    throw new Error('listener failed');
  });
  countCell.subscribe(after);
  countCell.set(1);
  expect(after).toHaveBeenCalledWith(1);
  expect(logs.at('error')).toHaveLength(1);
});

it('should accept a boxed value of the cell type', () => {
  const countCell = new ReactiveCell(10);
  const callback = vi.fn();
  countCell.subscribe(callback);
  expect(countCell.setValue(11)).toBe(true);
  expect(countCell.get()).toBe(11);
  expect(callback).toHaveBeenCalledWith(11);
});

it('should drop and report a boxed value of another type', () => {
  const countCell = new ReactiveCell(10);
  const callback = vi.fn();
  countCell.subscribe(callback);
  expect(countCell.setValue('eleven')).toBe(false);
  expect(countCell.get()).toBe(10);
  expect(callback).not.toHaveBeenCalled();

  const [record] = logs.at('error');
  expect(record?.properties).toMatchObject({
    value: 'eleven',
    actualType: 'string',
    valueType: 'number'
  });
});

it('should clear subscribers and release dependents on dispose', () => {
  const countCell = new ReactiveCell(0);
  const callback = vi.fn();
  const release = vi.fn();
  countCell.subscribe(callback);
  countCell.addDependentSubscription(release);
  countCell.dispose();
  countCell.dispose();
  countCell.set(1);
  expect(release).toHaveBeenCalledTimes(1);
  expect(callback).not.toHaveBeenCalled();
  expect(countCell.hasSubscribers).toBe(false);
  expect(countCell.isDisposed).toBe(true);
});

it('should publish a change event tagged with the registered key', () => {
  const events = new EventBus();
  const keys = new PropertyStore();
  const scoreCell = new ReactiveCell(5, { context: { events, keys } });
  keys.registerProperty('score', scoreCell);
  const handler = vi.fn();
  events.subscribe(PropertyChangedEvent, handler);
  scoreCell.set(6);
  expect(handler).toHaveBeenCalledTimes(1);

  const event: PropertyChangedEvent = handler.mock.calls[0]?.[0];
  expect(event.propertyKey).toBe('score');
  expect(event.oldValue).toBe(5);
  expect(event.newValue).toBe(6);
  expect(event.valueType.name).toBe('number');
});

it('should notify subscribers before publishing the change event', () => {
  const events = new EventBus();
  const countCell = new ReactiveCell(0, { context: { events } });
  const order: string[] = [];
  events.subscribe(PropertyChangedEvent, () => order.push('event'));
  countCell.subscribe(() => order.push('subscriber'));
  countCell.set(1);
  expect(order).toEqual(['subscriber', 'event']);
});

it('should marshal notifications when called off the main thread', () => {
  const marshaller = new QueuedThreadMarshaller({ ownerThreadId: -1 });
  const countCell = new ReactiveCell(0, { context: { marshaller } });
  const callback = vi.fn();
  countCell.subscribe(callback);
  countCell.set(1);
  expect(callback).not.toHaveBeenCalled();
  expect(marshaller.queuedActionCount).toBe(1);
  marshaller.processMainThreadActions();
  expect(callback).toHaveBeenCalledWith(1);
});

it('should not deliver a marshalled notification to a subscription disposed meanwhile', () => {
  const marshaller = new QueuedThreadMarshaller({ ownerThreadId: -1 });
  const countCell = new ReactiveCell(0, { context: { marshaller } });
  const callback = vi.fn();
  const unsubscribe = countCell.subscribe(callback);
  countCell.set(1);
  unsubscribe();
  marshaller.processMainThreadActions();
  expect(callback).not.toHaveBeenCalled();
});

it('should isolate a subscriber that throws when fired on subscribe', () => {
  const countCell = new ReactiveCell(3);
  const failing = vi.fn(() => {
    throw new Error('listener failed');
  });
  expect(() => countCell.subscribe(failing, { fireOnSubscribe: true })).not.toThrow();
  expect(() =>
    countCell.subscribeWithOldValue(failing, { fireOnSubscribe: true })
  ).not.toThrow();
  expect(logs.at('error')).toHaveLength(2);

  countCell.set(4);
  expect(failing).toHaveBeenCalledTimes(4);
  expect(countCell.subscriberCount).toBe(2);
});

it('should release a dependent added after dispose right away', () => {
  const countCell = new ReactiveCell(0);
  countCell.dispose();
  const release = vi.fn();
  countCell.addDependentSubscription(release);
  expect(release).toHaveBeenCalledTimes(1);
  countCell.dispose();
  expect(release).toHaveBeenCalledTimes(1);
});
