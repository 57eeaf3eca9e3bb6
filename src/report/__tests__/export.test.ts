/**
 * @fileoverview Tests for writing reports and CSV exports to disk
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { annotateImage } from '../../annotation/annotate.js';
import { createSteppingClock } from '../../core/clock.js';
import { IOError } from '../../core/errors.js';
import { RecordStore } from '../../store/record_store.js';
import { setLogLevel } from '../../telemetry/logger.js';
import { parseAnnotationsCsv } from '../csv.js';
import { exportToCsv, saveReport, serializeReport, writeReport } from '../export.js';
import { generateReport } from '../summary.js';

describe('report export', () => {
  let dir: string;
  let store: RecordStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'labelbook-export-'));
    store = new RecordStore({ clock: createSteppingClock(new Date('2025-06-01T00:00:00.000Z')) });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('saveReport', () => {
    it('writes the report as indented JSON with a trailing newline', async () => {
      annotateImage(store, { id: 'IMG_001', category: 'vehicle', confidence: 5 });
      const file = join(dir, 'annotation_report.json');

      const report = saveReport(store, file);
      const text = await readFile(file, 'utf8');

      expect(text).toBe(JSON.stringify(report, null, 2) + '\n');
      expect(JSON.parse(text)).toEqual(report);
    });

    it('creates missing parent directories', async () => {
      const file = join(dir, 'nested', 'deeper', 'report.json');
      saveReport(store, file);

      expect(JSON.parse(await readFile(file, 'utf8')).summary.totalAnnotations).toBe(0);
    });

    it('honours the indent option', () => {
      const report = generateReport(store, '2025-07-01T00:00:00.000Z');
      expect(serializeReport(report, { indent: 0 })).toBe(JSON.stringify(report) + '\n');
    });

    it('leaves no temp files behind', async () => {
      saveReport(store, join(dir, 'report.json'));
      expect(await readdir(dir)).toEqual(['report.json']);
    });

    it('throws IOError when the destination cannot be written', async () => {
      const blocker = join(dir, 'not-a-directory');
      await writeFile(blocker, 'x', 'utf8');

      expect(() => writeReport(generateReport(store), join(blocker, 'report.json'))).toThrow(IOError);
    });

    it('keeps an existing report intact when a write fails', async () => {
      const file = join(dir, 'report.json');
      await writeFile(file, '{"previous":true}\n', 'utf8');
      const blocked = join(file, 'child.json');

      expect(() => saveReport(store, blocked)).toThrow(IOError);
      expect(await readFile(file, 'utf8')).toBe('{"previous":true}\n');
    });
  });

  describe('exportToCsv', () => {
    it('round-trips the stored annotations', async () => {
      annotateImage(store, { id: 'IMG_001', category: 'vehicle', confidence: 5, notes: 'Clear image of a car' });
      annotateImage(store, { id: 'IMG_005', category: 'vehicle', confidence: 4, notes: 'Truck, side view' });
      const file = join(dir, 'annotations.csv');

      const written = exportToCsv(store, file);
      const rows = parseAnnotationsCsv(await readFile(file, 'utf8'));

      expect(written.path).toBe(file);
      expect(rows).toEqual([
        {
          id: 'IMG_001',
          category: 'vehicle',
          confidence: 5,
          notes: 'Clear image of a car',
          timestamp: '2025-06-01T00:00:00.000Z',
        },
        {
          id: 'IMG_005',
          category: 'vehicle',
          confidence: 4,
          notes: 'Truck, side view',
          timestamp: '2025-06-01T00:00:01.000Z',
        },
      ]);
    });

    it('writes the header only for an empty store and warns', async () => {
      setLogLevel('warn');
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const file = join(dir, 'empty.csv');

      exportToCsv(store, file);

      expect(await readFile(file, 'utf8')).toBe('id,category,confidence,notes,timestamp\n');
      expect(warn).toHaveBeenCalledWith('No annotations to export; writing header only', { path: file });
      warn.mockRestore();
    });

    it('throws IOError for an unwritable path', async () => {
      const blocker = join(dir, 'file');
      await writeFile(blocker, 'x', 'utf8');

      try {
        exportToCsv(store, join(blocker, 'annotations.csv'));
        expect.unreachable('exportToCsv should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(IOError);
        if (error instanceof IOError) {
          expect(error.operation).toBe('write');
          expect(error.path).toBe(join(blocker, 'annotations.csv'));
        }
      }
    });
  });
});
