import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadOverlayFile, loadSchemaFile, parseBaseSchema, parseOverlay } from '../../schema/schemaLoader';
import { SchemaError } from '../../utils/errors';
import { testBaseSchema } from '../fixtures/schemas';

describe('parseBaseSchema', () => {
  it('should parse the test schema', () => {
    const doc = parseBaseSchema(testBaseSchema);
    expect(doc.version).toBe('test-1');
    expect(doc.groups.map((g) => g.name)).toEqual([
      'household',
      'home_sale',
      'care_a',
      'care_b',
      'shared',
      'income',
      'costs',
      'assets',
    ]);
  });

  it('should fill missing defaults', () => {
    const doc = parseBaseSchema({
      groups: [
        {
          name: 'g',
          fields: [
            { key: 'amount', label: 'Amount', type: 'currency' },
            { key: 'ok', label: 'OK', type: 'boolean' },
            { key: 'room', label: 'Room', type: 'enum', choices: ['studio', 'one_bedroom'] },
            { key: 'note', label: 'Note', type: 'text' },
          ],
        },
      ],
    });
    expect(doc.groups[0].fields.map((f) => f.default)).toEqual([0, false, 'studio', '']);
  });

  it('should throw SchemaError for a malformed document', () => {
    expect(() => parseBaseSchema({ groups: 'none' })).toThrow(SchemaError);
  });

  it('should report the offending path', () => {
    let caught: unknown;
    try {
      parseBaseSchema({ groups: [{ name: 'g', fields: [{ key: 'x', label: 'X', type: 'date' }] }] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SchemaError);
    if (caught instanceof SchemaError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0].startsWith('groups.0.fields.0.type:')).toBe(true);
    }
  });
});

describe('parseOverlay', () => {
  it('should name an add-group group after its target', () => {
    const overlay = parseOverlay({
      directives: [{ action: 'add-group', target: 'extra', group: { fields: [] } }],
    });
    const directive = overlay.directives[0];
    expect(directive.action).toBe('add-group');
    if (directive.action === 'add-group') {
      expect(directive.group.name).toBe('extra');
    }
  });

  it('should reject an add-group whose group name differs from its target', () => {
    expect(() =>
      parseOverlay({ directives: [{ action: 'add-group', target: 'extra', group: { name: 'other' } }] })
    ).toThrow('add-group directive targets "extra" but its group is named "other"');
  });

  it('should reject an unknown action', () => {
    expect(() => parseOverlay({ directives: [{ action: 'remove-field', target: 'assets' }] })).toThrow(SchemaError);
  });
});

describe('schema files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'care-schema-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should load a base schema from disk', () => {
    const file = path.join(dir, 'base.json');
    fs.writeFileSync(file, JSON.stringify(testBaseSchema));
    expect(loadSchemaFile(file).groups).toHaveLength(8);
  });

  it('should load an overlay from disk', () => {
    const file = path.join(dir, 'overlay.json');
    fs.writeFileSync(file, JSON.stringify({ version: 'v2', directives: [] }));
    expect(loadOverlayFile(file)).toEqual({ version: 'v2', directives: [] });
  });

  it('should throw SchemaError for invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "groups": [');
    expect(() => loadSchemaFile(file)).toThrow(`Schema file "${file}" is not valid JSON`);
  });

  it('should throw SchemaError for a missing file', () => {
    const file = path.join(dir, 'missing.json');
    expect(() => loadSchemaFile(file)).toThrow(SchemaError);
  });

  it('should load the shipped schema documents', () => {
    const dataDir = path.join(__dirname, '../../../data');
    expect(() => loadSchemaFile(path.join(dataDir, 'senior_care_base.json'))).not.toThrow();
    expect(() => loadOverlayFile(path.join(dataDir, 'senior_care_overlay.json'))).not.toThrow();
  });
});
