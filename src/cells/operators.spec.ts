import { expect, it, vi } from 'vitest';
import { ValueTypes } from '../value-type';
import { combineWith, distinctUntilChanged, transform, where } from './operators';
import { ReactiveCell } from './reactive-cell';

it('should transform the source value', () => {
  const celsius = new ReactiveCell(20);
  const fahrenheit = transform(celsius, (value) => (value * 9) / 5 + 32);
  expect(fahrenheit.get()).toBe(68);

  const callback = vi.fn();
  fahrenheit.subscribe(callback);
  celsius.set(100);
  expect(fahrenheit.get()).toBe(212);
  expect(callback).toHaveBeenCalledWith(212);
});

it('should combine two sources', () => {
  const first = new ReactiveCell('Ada');
  const last = new ReactiveCell('Lovelace');
  const full = combineWith(first, last, (a, b) => `${a} ${b}`);
  expect(full.get()).toBe('Ada Lovelace');

  first.set('Augusta');
  expect(full.get()).toBe('Augusta Lovelace');
  last.set('King');
  expect(full.get()).toBe('Augusta King');
});

it('should only follow values accepted by the predicate', () => {
  const source = new ReactiveCell(1);
  const even = where(source, (value) => value % 2 === 0);
  expect(even.get()).toBe(1);

  source.set(2);
  expect(even.get()).toBe(2);
  source.set(3);
  expect(even.get()).toBe(2);
  source.set(4);
  expect(even.get()).toBe(4);
});

it('should keep the source value type for filtered cells', () => {
  const source = new ReactiveCell(1, { valueType: ValueTypes.integer });
  const positive = where(source, (value) => value > 0);
  expect(positive.valueType).toBe(ValueTypes.integer);
  expect(positive.setValue(1.5)).toBe(false);
});

it('should detach derived cells from their sources on dispose', () => {
  const first = new ReactiveCell(1);
  const second = new ReactiveCell(2);
  const sum = combineWith(first, second, (a, b) => a + b);
  expect(first.subscriberCount).toBe(1);
  expect(second.subscriberCount).toBe(1);

  sum.dispose();
  expect(first.subscriberCount).toBe(0);
  expect(second.subscriberCount).toBe(0);
  first.set(10);
  expect(sum.get()).toBe(3);
});

it('should absorb repeated values of the source', () => {
  const source = new ReactiveCell(1);
  const distinct = distinctUntilChanged(source);
  const sourceCalls = vi.fn();
  const distinctCalls = vi.fn();
  source.subscribe(sourceCalls);
  distinct.subscribe(distinctCalls);

  source.set(1, true);
  source.set(2);
  expect(sourceCalls).toHaveBeenCalledTimes(2);
  expect(distinctCalls).toHaveBeenCalledTimes(1);
  expect(distinct.get()).toBe(2);
});

it('should compare distinct values with a custom equality', () => {
  const source = new ReactiveCell({ id: 1, label: 'a' });
  const byId = distinctUntilChanged(source, {
    equals: (left, right) => left.id === right.id
  });
  const callback = vi.fn();
  byId.subscribe(callback);

  source.set({ id: 1, label: 'b' });
  expect(callback).not.toHaveBeenCalled();
  expect(byId.get().label).toBe('a');
  source.set({ id: 2, label: 'c' });
  expect(callback).toHaveBeenCalledWith({ id: 2, label: 'c' });
});
