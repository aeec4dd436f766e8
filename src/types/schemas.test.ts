import { describe, it, expect } from 'vitest';
import { BatchRequestSchema, parseEndpointConfig, parseTrafficSample, parseWith } from './schemas';
import { ValidationError } from '../core/errors';

describe('input schemas', () => {
  it('should fill endpoint config defaults', () => {
    expect(parseEndpointConfig({ id: 'orders-api', name: 'Orders API' })).toEqual({
      id: 'orders-api',
      name: 'Orders API',
      whitelist: [],
      authMethod: 'None',
      clientSsl: false,
      backendSsl: false,
    });
  });

  it('should report every invalid field with its path', () => {
    expect(() => parseEndpointConfig({ id: 'x', name: 'X', allowedHours: { startHour: 30, endHour: 4 }, whitelist: [1] }))
      .toThrow('Invalid endpoint config: whitelist.0: Expected string, received number; allowedHours.startHour: Number must be less than or equal to 23');
  });

  it('should coerce status codes and header values in traffic logs', () => {
    expect(parseTrafficSample([
      { timestamp: '2024-03-02T10:15:00Z', statusCode: '503', headers: { 'x-retry': 2 }, scheme: null },
    ])).toEqual([
      { timestamp: '2024-03-02T10:15:00Z', statusCode: 503, headers: { 'x-retry': '2' }, scheme: null },
    ]);
  });

  it('should reject a non-array traffic log', () => {
    expect(() => parseTrafficSample({ entries: [] })).toThrow(ValidationError);
  });

  it('should bound batch sizes', () => {
    const ids = Array.from({ length: 51 }, (_, i) => `api-${i}`);
    expect(() => parseWith(BatchRequestSchema, { endpointIds: ids }, 'request body')).toThrow(ValidationError);
    expect(parseWith(BatchRequestSchema, { endpointIds: ['orders-api'] }, 'request body').endpointIds).toEqual(['orders-api']);
  });
});
