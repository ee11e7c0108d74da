import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CheckpointStore, CheckpointRecordError } from '../CheckpointStore.js';
import type { DocumentRecord } from '../types.js';

function record(documentId: string, overrides: Partial<DocumentRecord> = {}): DocumentRecord {
  return {
    documentId,
    verdict: 'high_quality',
    consensusReached: true,
    processingTimeSeconds: 1.5,
    processedAt: '2024-05-01T10:00:00.000Z',
    ...overrides,
  };
}

describe('CheckpointStore', () => {
  let tempDir: string;
  let stateFile: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'checkpoint-'));
    stateFile = path.join(tempDir, 'state', 'processing-state.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function readDisk(): unknown {
    return JSON.parse(fs.readFileSync(stateFile, 'utf-8'));
  }

  it('should create an empty checkpoint file when none exists', () => {
    const store = new CheckpointStore(stateFile);
    const state = store.load();

    expect(store.getLastLoadStatus()).toBe('absent');
    expect(state.documents).toEqual({});
    expect(state.createdAt).toBe(state.lastUpdated);
    expect(readDisk()).toEqual(state);
  });

  it('should replace an undecodable file with an empty checkpoint', () => {
    fs.mkdirSync(path.dirname(stateFile), { recursive: true });
    fs.writeFileSync(stateFile, '{invalid json');

    const store = new CheckpointStore(stateFile);
    const state = store.load();

    expect(store.getLastLoadStatus()).toBe('corrupt');
    expect(state.documents).toEqual({});
    expect(readDisk()).toEqual(state);

    const reopened = new CheckpointStore(stateFile);
    expect(reopened.load()).toEqual(state);
    expect(reopened.getLastLoadStatus()).toBe('valid');
  });

  it('should replace a file missing the documents field', () => {
    fs.mkdirSync(path.dirname(stateFile), { recursive: true });
    fs.writeFileSync(stateFile, JSON.stringify({ createdAt: 'a', lastUpdated: 'b' }));

    const store = new CheckpointStore(stateFile);
    store.load();

    expect(store.getLastLoadStatus()).toBe('corrupt');
    expect(store.summary().totalProcessed).toBe(0);
  });

  it('should remember processed documents across store instances', () => {
    const first = new CheckpointStore(stateFile);
    first.load();
    first.append(record('12'));

    const second = new CheckpointStore(stateFile);
    second.load();

    expect(second.getLastLoadStatus()).toBe('valid');
    expect(second.isProcessed('12')).toBe(true);
    expect(second.isProcessed('13')).toBe(false);
    expect(second.getRecord('12')).toEqual(record('12'));
  });

  it('should write atomically without leaving the temp file behind', () => {
    const store = new CheckpointStore(stateFile);
    store.load();
    store.append(record('1'));

    expect(fs.existsSync(`${stateFile}.tmp`)).toBe(false);
    expect(readDisk()).toMatchObject({ documents: { '1': record('1') } });
  });

  it('should load lazily when queried before load', () => {
    const store = new CheckpointStore(stateFile);

    expect(store.isProcessed('1')).toBe(false);
    expect(fs.existsSync(stateFile)).toBe(true);
  });

  it('should replace an existing record for the same document', () => {
    const store = new CheckpointStore(stateFile);
    store.load();
    store.append(record('5', { verdict: 'unparseable', consensusReached: false }));
    store.append(record('5', { verdict: 'low_quality' }));

    expect(store.summary().totalProcessed).toBe(1);
    expect(store.getRecord('5')?.verdict).toBe('low_quality');
  });

  it('should advance lastUpdated on every append and keep createdAt', async () => {
    const store = new CheckpointStore(stateFile);
    const initial = store.load();

    await new Promise(resolve => setTimeout(resolve, 5));
    store.append(record('1'));
    const after = store.summary();

    expect(after.createdAt).toBe(initial.createdAt);
    expect(after.lastUpdated > initial.lastUpdated).toBe(true);
  });

  it('should summarise recorded outcomes', () => {
    const store = new CheckpointStore(stateFile);
    store.load();
    store.append(record('1', { processingTimeSeconds: 2 }));
    store.append(record('2', { processingTimeSeconds: 1, newTitle: 'Tax Return 2023' }));
    store.append(record('3', { verdict: 'low_quality', processingTimeSeconds: 0.5 }));
    store.append(record('4', { verdict: 'unparseable', consensusReached: false, processingTimeSeconds: 3 }));
    store.append(record('5', { verdict: 'unparseable', consensusReached: false, error: 'HTTP 500', processingTimeSeconds: 1.5 }));

    const reopened = new CheckpointStore(stateFile);
    reopened.load();
    const summary = reopened.summary();

    expect(reopened.getRecord('2')).toEqual(record('2', { processingTimeSeconds: 1, newTitle: 'Tax Return 2023' }));
    expect(summary).toMatchObject({
      totalProcessed: 5,
      highQuality: 2,
      lowQuality: 1,
      unparseable: 2,
      consensusCount: 3,
      errorCount: 1,
      totalProcessingTimeSeconds: 8,
    });
  });

  it('should clear to an empty checkpoint and stay empty when cleared again', () => {
    const store = new CheckpointStore(stateFile);
    store.load();
    store.append(record('1'));

    store.clear();
    store.clear();

    expect(store.summary().totalProcessed).toBe(0);
    expect(store.isProcessed('1')).toBe(false);

    const reopened = new CheckpointStore(stateFile);
    reopened.load();
    expect(reopened.summary().totalProcessed).toBe(0);
  });

  it('should return copies that do not change the stored state', () => {
    const store = new CheckpointStore(stateFile);
    const state = store.load();
    state.documents['x'] = record('x');

    expect(store.isProcessed('x')).toBe(false);
  });

  it('should treat object prototype names as ordinary document ids', () => {
    const store = new CheckpointStore(stateFile);
    store.load();

    expect(store.isProcessed('constructor')).toBe(false);
    expect(store.isProcessed('toString')).toBe(false);
    expect(store.getRecord('toString')).toBeUndefined();

    store.append(record('constructor'));

    const reopened = new CheckpointStore(stateFile);
    reopened.load();
    expect(reopened.getLastLoadStatus()).toBe('valid');
    expect(reopened.isProcessed('constructor')).toBe(true);
    expect(reopened.isProcessed('hasOwnProperty')).toBe(false);
    expect(reopened.getRecord('constructor')).toEqual(record('constructor'));
  });

  it('should refuse an invalid record and keep the file loadable', () => {
    const store = new CheckpointStore(stateFile);
    store.load();
    store.append(record('1'));
    store.append(record('2'));
    store.append(record('3'));

    expect(() => store.append(record('4', { processingTimeSeconds: -0.002 }))).toThrow(CheckpointRecordError);
    expect(() => store.append(record('4', { processingTimeSeconds: Number.NaN }))).toThrow(
      'Refusing to write checkpoint record for document 4: documents.4.processingTimeSeconds is not a non-negative number'
    );
    expect(store.isProcessed('4')).toBe(false);

    const reopened = new CheckpointStore(stateFile);
    const state = reopened.load();
    expect(reopened.getLastLoadStatus()).toBe('valid');
    expect(Object.keys(state.documents)).toEqual(['1', '2', '3']);
  });

  it('should move a directory at the checkpoint path aside and start fresh', () => {
    fs.mkdirSync(stateFile, { recursive: true });

    const store = new CheckpointStore(stateFile);
    const state = store.load();

    expect(store.getLastLoadStatus()).toBe('corrupt');
    expect(state.documents).toEqual({});
    expect(fs.statSync(stateFile).isFile()).toBe(true);
    expect(readDisk()).toEqual(state);

    const movedAside = fs
      .readdirSync(path.dirname(stateFile))
      .filter(name => name.startsWith('processing-state.json.corrupt-'));
    expect(movedAside).toHaveLength(1);
    expect(fs.statSync(path.join(path.dirname(stateFile), movedAside[0])).isDirectory()).toBe(true);
  });
});
