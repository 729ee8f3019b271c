import test from 'node:test';
import assert from 'node:assert/strict';
import {
  addDays,
  daysBetween,
  isCalendarDate,
  localCalendarDate,
  parseCalendarDate,
} from '../src/todo/date.js';

test('isCalendarDate accepts real days only', () => {
  assert.equal(isCalendarDate('2024-02-29'), true);
  assert.equal(isCalendarDate('2023-02-29'), false);
  assert.equal(isCalendarDate('2024-13-01'), false);
  assert.equal(isCalendarDate('2024-1-01'), false);
  assert.equal(parseCalendarDate('2024-04-31'), undefined);
});

test('years below 100 are not shifted into the 1900s', () => {
  assert.equal(isCalendarDate('0050-01-01'), true);
  assert.equal(isCalendarDate('0004-02-29'), true);
  assert.equal(isCalendarDate('0100-02-29'), false);
  assert.equal(addDays('0099-12-31', 1), '0100-01-01');
  assert.equal(daysBetween('0050-01-01', '0050-01-31'), 30);
});

test('daysBetween and addDays work across month and year ends', () => {
  assert.equal(daysBetween('2023-12-30', '2024-01-02'), 3);
  assert.equal(daysBetween('2024-01-02', '2023-12-30'), -3);
  assert.equal(addDays('2024-02-27', 2), '2024-02-29');
  assert.equal(addDays('2023-12-31', 1), '2024-01-01');
});

test('localCalendarDate uses local date fields', () => {
  assert.equal(localCalendarDate(new Date(2024, 0, 5, 23, 30)), '2024-01-05');
});
