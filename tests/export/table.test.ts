import { describe, it, expect, beforeEach, vi } from 'vitest';
import { cleanRecord, toTable } from '../../src/export/table.js';
import { Logger } from '../../src/utils/logger.js';

describe('cleanRecord', () => {
  it('should drop every underscore-prefixed key', () => {
    const cleaned = cleanRecord({
      __metadata: { type: 'SP.Data.ListItem' },
      _ModerationStatus: 0,
      Id: 7,
      Title: 'Quito trip',
    });

    expect(cleaned).toEqual({ Id: 7, Title: 'Quito trip' });
  });

  it('should keep other keys, values and order unchanged', () => {
    const nested = { Email: 'someone@example.test' };
    const cleaned = cleanRecord({ b: 1, _x: 2, 'odata.etag': '"1"', a: nested, c_: null });

    expect(Object.keys(cleaned)).toEqual(['b', 'odata.etag', 'a', 'c_']);
    expect(cleaned.a).toBe(nested);
  });

  it('should not modify its input', () => {
    const record = { _hidden: true, Id: 1 };
    cleanRecord(record);

    expect(record).toEqual({ _hidden: true, Id: 1 });
  });
});

describe('toTable', () => {
  let logger: Logger;
  let emitter: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    logger = new Logger('test');
    emitter = vi.fn();
    logger.setEmitter(emitter);
  });

  it('should return an empty table and warn for no records', () => {
    const table = toTable([], logger);

    expect(table).toEqual({ columns: [], rows: [] });
    expect(emitter).toHaveBeenCalledTimes(1);
    expect(emitter.mock.calls[0][0]).toMatchObject({
      level: 'warning',
      logger: 'test/table',
      data: { message: 'No items were retrieved from the list.' },
    });
  });

  it('should collect the union of columns in first-seen order', () => {
    const table = toTable(
      [
        { _id: 'x', Id: 1, Title: 'A' },
        { Id: 2, Status: 'Approved' },
        { Title: 'C', Id: 3 },
      ],
      logger
    );

    expect(table.columns).toEqual(['Id', 'Title', 'Status']);
    expect(table.rows).toEqual([
      { Id: 1, Title: 'A' },
      { Id: 2, Status: 'Approved' },
      { Title: 'C', Id: 3 },
    ]);
    expect(emitter).not.toHaveBeenCalled();
  });
});
