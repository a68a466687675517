import { describe, it, expect } from 'vitest';
import {
  artifactRefPattern,
  submitRunFieldsSchema,
  taskStatusResponseSchema,
} from './billing-run.validation.js';

describe('submitRunFieldsSchema', () => {
  it('trims the key and username but keeps the password as sent', () => {
    expect(
      submitRunFieldsSchema.parse({
        customer_key: ' test-key ',
        username: 'test-user ',
        password: ' test-secret ',
      }),
    ).toEqual({ customer_key: 'test-key', username: 'test-user', password: ' test-secret ' });
  });

  it('reports blank fields as required', () => {
    const result = submitRunFieldsSchema.safeParse({ customer_key: '  ', username: 'test-user' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => [i.path[0], i.message])).toEqual([
      ['customer_key', 'customer_key is required'],
      ['password', 'password is required'],
    ]);
  });
});

describe('artifactRefPattern', () => {
  it('matches only processed-data refs with a lowercase task id', () => {
    expect(artifactRefPattern.test('Processed_Data_3f2b8c1e-5d4a-4e6b-9c7d-0a1b2c3d4e5f.xlsx')).toBe(true);
    expect(artifactRefPattern.test('Processed_Data_3F2B8C1E-5D4A-4E6B-9C7D-0A1B2C3D4E5F.xlsx')).toBe(false);
    expect(artifactRefPattern.test('Processed_Data_3f2b8c1e-5d4a-4e6b-9c7d-0a1b2c3d4e5fxlsx')).toBe(false);
    expect(artifactRefPattern.test('../tasks/x.json')).toBe(false);
  });
});

describe('taskStatusResponseSchema', () => {
  it('accepts a pending task and drops fields outside the contract', () => {
    expect(
      taskStatusResponseSchema.parse({
        data: { task_id: 'abc', status: 'pending', createdAt: '2024-03-15T10:00:00.000Z' },
      }),
    ).toEqual({ data: { task_id: 'abc', status: 'pending' } });
  });

  it('rejects an unknown status', () => {
    expect(
      taskStatusResponseSchema.safeParse({ data: { task_id: 'abc', status: 'running' } }).success,
    ).toBe(false);
  });
});
