import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { csvEscape, formatCell, safeFileName, saveToCsv, toCsv } from '../../src/export/csv.js';
import { Logger } from '../../src/utils/logger.js';

describe('csvEscape', () => {
  it('should leave plain values alone', () => {
    expect(csvEscape('Quito')).toBe('Quito');
  });

  it('should quote values with separators, quotes or line breaks', () => {
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape('line1\nline2')).toBe('"line1\nline2"');
    expect(csvEscape('cr\r')).toBe('"cr\r"');
  });
});

describe('formatCell', () => {
  it('should render missing values as empty cells', () => {
    expect(formatCell(null)).toBe('');
    expect(formatCell(undefined)).toBe('');
  });

  it('should render nested values as JSON', () => {
    expect(formatCell({ Title: 'x' })).toBe('{"Title":"x"}');
    expect(formatCell([1, 2])).toBe('[1,2]');
  });

  it('should stringify scalars', () => {
    expect(formatCell(false)).toBe('false');
    expect(formatCell(12.5)).toBe('12.5');
  });
});

describe('toCsv', () => {
  it('should write a header and one line per row', () => {
    const csv = toCsv({
      columns: ['Id', 'Title', 'Tags'],
      rows: [{ Id: 1, Title: 'Hello, "world"', Tags: ['a', 'b'] }, { Id: 2 }],
    });

    expect(csv).toBe('Id,Title,Tags\n1,"Hello, ""world""","[""a"",""b""]"\n2,,\n');
  });

  it('should produce an empty document for an empty table', () => {
    expect(toCsv({ columns: [], rows: [] })).toBe('');
  });
});

describe('safeFileName', () => {
  it('should replace spaces with underscores', () => {
    expect(safeFileName('RA4-1 Solicitud para Viajes')).toBe('RA4-1_Solicitud_para_Viajes.csv');
  });

  it('should strip characters outside letters, digits, space, hyphen and underscore', () => {
    expect(safeFileName('Travel: Requests / 2024 ')).toBe('Travel_Requests__2024.csv');
  });

  it('should keep accented letters', () => {
    expect(safeFileName('Año Fiscal')).toBe('Año_Fiscal.csv');
  });
});

describe('saveToCsv', () => {
  it('should write the file and return its path', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'sp-export-'));
    const logger = new Logger('test');
    const emitter = vi.fn();
    logger.setEmitter(emitter);

    try {
      const path = await saveToCsv(
        { columns: ['Id'], rows: [{ Id: 1 }] },
        'Ignored Title',
        logger,
        join(dir, 'items.csv')
      );

      expect(path).toBe(join(dir, 'items.csv'));
      expect(await readFile(path, 'utf8')).toBe('Id\n1\n');
      expect(emitter.mock.calls[0][0].data).toMatchObject({ action: 'saved', path, rows: 1 });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
