import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError, DocumentParseError } from '../errors.js';
import { createMemoryLogger } from '../logger.js';
import { ResourceRemover } from './remover.js';

let root: string;

function write(path: string, content: string): void {
  const fullPath = join(root, path);
  mkdirSync(dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, content);
}

function exists(path: string): boolean {
  return existsSync(join(root, path));
}

function read(path: string): string {
  return readFileSync(join(root, path), 'utf-8');
}

const STRINGS = [
  '<resources>',
  '    <string name="used">Used</string>',
  '    <string name="unused_label">Unused</string>',
  '    <string name="keep_title">Kept</string>',
  '</resources>',
  '',
].join('\n');

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'restidy-remove-'));
});

describe('ResourceRemover', () => {
  it('removes unreferenced units and is idempotent once converged', () => {
    write('lib/src/main/res/values/strings.xml', STRINGS);
    write('lib/src/main/java/Screen.kt', 'getString(R.string.used)\n');
    const remover = new ResourceRemover();
    const options = {
      target: join(root, 'lib'),
      typeFilter: new Set(['String'] as const),
      maxRounds: 10,
      ignorePattern: /^keep_/,
    };

    const first = remover.removeResources(options);

    expect(first.total).toBe(1);
    expect(read('lib/src/main/res/values/strings.xml')).toBe(
      [
        '<resources>',
        '    <string name="used">Used</string>',
        '    <string name="keep_title">Kept</string>',
        '</resources>',
        '',
      ].join('\n')
    );

    const second = remover.removeResources(options);
    expect(second.total).toBe(0);
    expect(second.rounds).toEqual([{ round: 1, affected: 0 }]);
  });

  it('keeps resources referenced by protected modules', () => {
    write('lib/src/main/res/values/strings.xml', STRINGS);
    write('app/src/main/res/layout/main.xml', '<TextView android:text="@string/unused_label"/>\n');

    const summary = new ResourceRemover().removeResources({
      target: join(root, 'lib'),
      protectedModules: [join(root, 'app')],
      typeFilter: new Set(['String']),
    });

    expect(summary.total).toBe(2);
    expect(read('lib/src/main/res/values/strings.xml')).toBe(
      '<resources>\n    <string name="unused_label">Unused</string>\n</resources>\n'
    );
  });

  it('removes resources left unused by earlier rounds', () => {
    write('lib/src/main/res/layout/orphan.xml', '<ImageView android:src="@drawable/orphan_icon"/>\n');
    write('lib/src/main/res/drawable/orphan_icon.png', 'icon');
    const logger = createMemoryLogger();

    const summary = new ResourceRemover({ logger }).removeResources({
      target: join(root, 'lib'),
      typeFilter: new Set(['Layout', 'Drawable']),
    });

    expect(summary.rounds.map((round) => round.affected)).toEqual([1, 1, 0]);
    expect(summary.total).toBe(2);
    expect(exists('lib/src/main/res/layout/orphan.xml')).toBe(false);
    expect(exists('lib/src/main/res/drawable/orphan_icon.png')).toBe(false);
    expect(logger.messages().at(-1)).toBe('2 resource(s) removed over 3 round(s).');
  });

  it('rejects a non-positive round cap', () => {
    expect(() =>
      new ResourceRemover().removeResources({ target: root, typeFilter: new Set(['String']), maxRounds: -1 })
    ).toThrow(ConfigurationError);
  });

  it('stops at a malformed document and keeps rewrites made earlier in the round', () => {
    write('lib/src/main/res/values/a_strings.xml', '<resources>\n    <string name="used">U</string>\n    <string name="unused">X</string>\n</resources>\n');
    write('lib/src/main/res/values/b_broken.xml', '<resources>\n    <string name="a">A</resources>\n');
    write('lib/src/main/java/Screen.kt', 'getString(R.string.used)\n');

    expect(() =>
      new ResourceRemover().removeResources({ target: join(root, 'lib'), typeFilter: new Set(['String']) })
    ).toThrow(DocumentParseError);
    expect(read('lib/src/main/res/values/a_strings.xml')).toBe('<resources>\n    <string name="used">U</string>\n</resources>\n');
  });
});
