import { describe, expect, it } from 'vitest';
import {
  classify,
  classifyDirectory,
  classifyElement,
  listResourceTypes,
  resourceNameOfElement,
  resourceNameOfFile,
  resourceTypeOfFile,
  typeToRawName,
} from './classifier.js';
import { ResourceDependencySet, createDependency } from './dependency.js';

describe('resource classification', () => {
  it('maps raw names to types and back', () => {
    expect(classify('drawable')).toBe('Drawable');
    expect(classify('anim')).toBe('Animation');
    expect(typeToRawName('Dimension')).toBe('dimen');
    expect(classify('values')).toBeNull();
    expect(classify('Drawable')).toBeNull();
  });

  it('lists every resource type in declaration order', () => {
    const types = listResourceTypes();

    expect(types).toHaveLength(24);
    expect(types.slice(0, 3)).toEqual(['Animation', 'Animator', 'Array']);
    expect(types.at(-1)).toBe('Xml');
  });

  it('ignores directory qualifiers', () => {
    expect(classifyDirectory('drawable-hdpi')).toBe('Drawable');
    expect(classifyDirectory('layout-sw600dp-land')).toBe('Layout');
    expect(classifyDirectory('values-night')).toBeNull();
  });

  it('derives type and name of standalone files', () => {
    const path = '/project/app/src/main/res/drawable-xxhdpi/ic_star.9.png';
    expect(resourceTypeOfFile(path)).toBe('Drawable');
    expect(resourceNameOfFile(path)).toBe('ic_star');
  });

  it('classifies container units by tag, alias or item type', () => {
    expect(classifyElement('string', { name: 'title' })).toBe('String');
    expect(classifyElement('string-array', { name: 'days' })).toBe('Array');
    expect(classifyElement('declare-styleable', { name: 'Chip' })).toBe('Styleable');
    expect(classifyElement('item', { type: 'id', name: 'anchor' })).toBe('Id');
    expect(classifyElement('item', { name: 'anchor' })).toBeNull();
    expect(classifyElement('eat-comment', {})).toBeNull();
  });

  it('normalizes dotted unit names', () => {
    expect(resourceNameOfElement({ name: 'Widget.Button.Primary' })).toBe('Widget_Button_Primary');
    expect(resourceNameOfElement({})).toBeNull();
  });
});

describe('ResourceDependencySet', () => {
  it('compares dependencies by type and name', () => {
    const set = new ResourceDependencySet([
      createDependency('String', 'title'),
      createDependency('String', 'title'),
      createDependency('Layout', 'title'),
    ]);

    expect(set.size).toBe(2);
    expect(set.has({ type: 'String', name: 'title' })).toBe(true);
    expect(set.has({ type: 'Color', name: 'title' })).toBe(false);
    expect(set.hasName('title')).toBe(true);
  });

  it('supports union, difference and type filtering', () => {
    const mine = new ResourceDependencySet([createDependency('String', 'a'), createDependency('Drawable', 'b')]);
    const theirs = new ResourceDependencySet([createDependency('Drawable', 'b'), createDependency('Color', 'c')]);

    expect(mine.union(theirs).size).toBe(3);
    expect(mine.difference(theirs).values()).toEqual([{ type: 'String', name: 'a' }]);
    expect(mine.filterTypes(new Set(['Drawable'])).values()).toEqual([{ type: 'Drawable', name: 'b' }]);
  });
});
