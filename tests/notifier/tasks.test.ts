import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../../src/notifier/error-handling';
import { loadTasks, parseTaskList, stripBlockComments } from '../../src/notifier/tasks';

const TASK_FILE = `/* Team reminders
   edited by hand */
[
  {
    "date": "2026-10-19",
    "time": "09:00",
    "title": "Stand-up",
    "content": "Share your status", /* inline note */
    "mention_phone_numbers": ["13800000000"]
  },
  { "date": "2026-10-20", "content": "Legacy", "at_mobiles": [13900000000], "is_at_all": true },
  { "time": "10:00" },
  "not a task",
  {
    "date": "2026-10-21",
    "time": null,
    "content_source_kind": " file ",
    "source_locator": "notes/agenda.md",
    "mention_user_ids": ["user-1"],
    "mention_everyone": false
  }
]`;

describe('Task list', () => {
  describe('stripBlockComments', () => {
    it('should remove every block comment, including multi-line ones', () => {
      expect(stripBlockComments('a /* x */ b /* y\n z */ c')).toBe('a  b  c');
    });

    it('should not nest comments', () => {
      expect(stripBlockComments('/* outer /* inner */ tail */')).toBe(' tail */');
    });
  });

  describe('parseTaskList', () => {
    const result = parseTaskList(TASK_FILE, 'tasks.json');

    it('should load valid records with their list position', () => {
      expect(result.tasks.map(task => task.index)).toEqual([0, 1, 4]);
      expect(result.tasks[0]).toEqual({
        index: 0,
        date: '2026-10-19',
        time: '09:00',
        contentSourceKind: 'static',
        content: 'Share your status',
        title: 'Stand-up',
        mentionPhoneNumbers: ['13800000000'],
        mentionUserIds: [],
        mentionEveryone: false
      });
    });

    it('should accept legacy mention keys', () => {
      expect(result.tasks[1]).toMatchObject({
        index: 1,
        mentionPhoneNumbers: ['13900000000'],
        mentionEveryone: true
      });
      expect(result.tasks[1].time).toBeUndefined();
    });

    it('should normalize the content source kind', () => {
      expect(result.tasks[2]).toMatchObject({
        contentSourceKind: 'file',
        sourceLocator: 'notes/agenda.md',
        mentionUserIds: ['user-1']
      });
      expect(result.tasks[2].time).toBeUndefined();
    });

    it('should report invalid records without dropping the others', () => {
      expect(result.invalid).toEqual([
        { taskIndex: 2, reason: 'invalid-record', message: 'date: Required' },
        { taskIndex: 3, reason: 'invalid-record', message: 'record: Expected object, received string' }
      ]);
    });

    it('should reject a document that is not an array', () => {
      expect(() => parseTaskList('{"date": "2026-10-19"}', 'inline')).toThrow(ConfigurationError);
      expect(() => parseTaskList('{"date": "2026-10-19"}', 'inline')).toThrow('inline must contain a JSON array of tasks');
    });

    it('should reject invalid JSON', () => {
      expect(() => parseTaskList('[{ "date": }]', 'tasks.json')).toThrow(/^Invalid JSON in tasks\.json/);
    });

    it('should load an empty list', () => {
      expect(parseTaskList('/* nothing yet */ []')).toEqual({ tasks: [], invalid: [] });
    });
  });

  describe('loadTasks', () => {
    let tempDir: string;

    beforeAll(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'notifier-tasks-'));
      fs.writeFileSync(path.join(tempDir, 'tasks.json'), TASK_FILE);
    });

    afterAll(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should read and parse the task file', async () => {
      const result = await loadTasks(path.join(tempDir, 'tasks.json'));
      expect(result.tasks).toHaveLength(3);
      expect(result.invalid).toHaveLength(2);
    });

    it('should fail with a configuration error when the file is missing', async () => {
      await expect(loadTasks(path.join(tempDir, 'absent.json'))).rejects.toBeInstanceOf(ConfigurationError);
      await expect(loadTasks(path.join(tempDir, 'absent.json'))).rejects.toThrow(/^Cannot read task list/);
    });
  });
});
