import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { JsonFileStorage } from '../JsonFileStorage';
import { PersistenceError } from '../../../shared/errors';
import { PersistedRecord } from '../../../shared/types';

const RECORD: PersistedRecord = {
  version: 1,
  settings: {
    focusMinutes: 25,
    shortBreakMinutes: 5,
    longBreakMinutes: 15,
    longBreakInterval: 4,
    darkMode: true,
  },
  tasks: [
    { id: 'a', text: 'Read chapter 3', pomodoros: 1, estimated: 2, position: 0, completed: false },
  ],
};

describe('JsonFileStorage', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pomodoro-ledger-'));
    file = path.join(dir, 'nested', 'data.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('returns null when nothing was saved', () => {
      expect(new JsonFileStorage(file).load()).toBeNull();
    });

    it('reads back what save wrote', () => {
      const storage = new JsonFileStorage(file);
      storage.save(RECORD);
      expect(storage.load()).toEqual(RECORD);
    });

    it('fails on invalid JSON', () => {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, 'not-valid-json{{{');
      expect(() => new JsonFileStorage(file).load()).toThrow(PersistenceError);
    });

    it('fails on a task with a negative count', () => {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      const bad = { ...RECORD, tasks: [{ ...RECORD.tasks[0], pomodoros: -1 }] };
      fs.writeFileSync(file, JSON.stringify(bad));
      expect(() => new JsonFileStorage(file).load()).toThrow(/tasks\.0\.pomodoros/);
    });

    it('fails when two tasks share an id', () => {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      const bad = {
        ...RECORD,
        tasks: [
          { ...RECORD.tasks[0], text: 'One' },
          { ...RECORD.tasks[0], text: 'Two', position: 1 },
        ],
      };
      fs.writeFileSync(file, JSON.stringify(bad));
      const load = () => new JsonFileStorage(file).load();
      expect(load).toThrow(PersistenceError);
      expect(load).toThrow('tasks.1.id: Duplicate task id "a"');
    });

    it('fails on blank or overlong task text', () => {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, JSON.stringify({ ...RECORD, tasks: [{ ...RECORD.tasks[0], text: '   ' }] }));
      expect(() => new JsonFileStorage(file).load()).toThrow('tasks.0.text: Task text cannot be empty');

      fs.writeFileSync(file, JSON.stringify({ ...RECORD, tasks: [{ ...RECORD.tasks[0], text: 'x'.repeat(201) }] }));
      expect(() => new JsonFileStorage(file).load()).toThrow('tasks.0.text: Task text is longer than 200 characters');
    });

    it('leaves settings for the caller to check', () => {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, JSON.stringify({ ...RECORD, settings: { focusMinutes: -1 } }));
      expect(new JsonFileStorage(file).load()?.settings).toEqual({ focusMinutes: -1 });
    });

    it('fails when the path is a directory', () => {
      expect(() => new JsonFileStorage(dir).load()).toThrow(PersistenceError);
    });
  });

  describe('save', () => {
    it('creates missing directories and writes pretty JSON', () => {
      new JsonFileStorage(file).save(RECORD);
      const raw = fs.readFileSync(file, 'utf-8');
      expect(raw.startsWith('{\n  "version": 1,')).toBe(true);
      expect(raw.endsWith('}\n')).toBe(true);
    });

    it('leaves no temp file behind', () => {
      new JsonFileStorage(file).save(RECORD);
      expect(fs.readdirSync(path.dirname(file))).toEqual(['data.json']);
    });

    it('wraps write failures', () => {
      const blocker = path.join(dir, 'blocker');
      fs.writeFileSync(blocker, '');
      const storage = new JsonFileStorage(path.join(blocker, 'data.json'));

      let error: unknown;
      try {
        storage.save(RECORD);
      } catch (err) {
        error = err;
      }
      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({ code: 'PERSISTENCE_FAILURE', path: path.join(blocker, 'data.json') });
    });
  });
});
