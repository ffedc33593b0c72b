import { classify, normalizeResourceName, listResourceTypes, typeToRawName } from '../classifier.js';
import { createDependency } from '../dependency.js';
import type { ResourceDependency } from '../types.js';

/**
 * One way of spelling a resource reference. `pattern` must be global;
 * `toDependency` returns null to drop a match.
 */
export interface ExtractionRule {
  name: string;
  pattern: RegExp;
  toDependency: (match: RegExpMatchArray) => ResourceDependency | null;
}

const RAW_NAMES = listResourceTypes()
  .map((type) => typeToRawName(type))
  .join('|');

/**
 * `GreetingCardBinding` -> `greeting_card`
 */
export function bindingClassToLayoutName(className: string): string {
  const withoutSuffix = className.endsWith('Binding') ? className.slice(0, -'Binding'.length) : className;
  return withoutSuffix.replace(/[A-Z]/g, (letter, offset: number) =>
    offset === 0 ? letter.toLowerCase() : `_${letter.toLowerCase()}`
  );
}

export const EXTRACTION_RULES: readonly ExtractionRule[] = [
  {
    // R.string.app_name
    name: 'code-usage',
    pattern: new RegExp(`(${RAW_NAMES})\\.(\\w+)`, 'g'),
    toDependency: (match) => {
      const type = classify(match[1] ?? '');
      const name = match[2];
      return type !== null && name !== undefined ? createDependency(type, name) : null;
    },
  },
  {
    // @drawable/ic_star, @style/Widget.Button
    name: 'markup-usage',
    pattern: /@([A-Za-z]+)\/([\w.]+)/g,
    toDependency: (match) => {
      const type = classify(match[1] ?? '');
      const name = match[2];
      return type !== null && name !== undefined ? createDependency(type, normalizeResourceName(name)) : null;
    },
  },
  {
    // <style name="Widget.Button.Primary" parent="Widget.Button">
    name: 'style-parent',
    pattern: /parent\s*=\s*"([\w.]+)"/g,
    toDependency: (match) => {
      const name = match[1];
      return name !== undefined ? createDependency('Style', normalizeResourceName(name)) : null;
    },
  },
  {
    // import com.example.databinding.ActivityMainBinding
    name: 'generated-binding',
    pattern: /databinding\.(\w+)/g,
    toDependency: (match) => {
      const className = match[1];
      return className !== undefined ? createDependency('Layout', bindingClassToLayoutName(className)) : null;
    },
  },
];

/**
 * Apply every rule to one line of text
 */
export function extractDependencies(
  line: string,
  rules: readonly ExtractionRule[] = EXTRACTION_RULES
): ResourceDependency[] {
  return rules.flatMap((rule) =>
    [...line.matchAll(rule.pattern)].flatMap((match) => {
      const dependency = rule.toDependency(match);
      return dependency !== null ? [dependency] : [];
    })
  );
}
