import { describe, it, expect } from 'vitest';
import { descendants, findFirst, findNodes, findNodesByTypes } from './traversal.js';
import { Parser } from './parser.js';
import { Language } from './language.js';
import { arithmeticLanguage } from '../testing/arithmetic-engine.js';

const parser = new Parser(Language.fromEngine(arithmeticLanguage));

describe('traversal', () => {
  describe('descendants', () => {
    it('should visit nodes in pre-order', () => {
      const root = parser.parseString('1+2').getRootNode();
      const types = [...descendants(root)].map(node => node.getType());
      expect(types).toEqual(['program', 'binary_expression', 'number', '+', 'number']);
    });

    it('should stop at the requested depth', () => {
      const root = parser.parseString('1 + 2 * 3').getRootNode();
      expect([...descendants(root, { maxDepth: 0 })].map(node => node.getType())).toEqual([
        'program',
      ]);
      expect([...descendants(root, { maxDepth: 1 })].map(node => node.getType())).toEqual([
        'program',
        'binary_expression',
      ]);
    });

    it('should not leave the start node', () => {
      const binary = parser.parseString('1+2').getRootNode().getNamedChild(0);
      const left = binary.getChildByFieldName('left');

      expect([...descendants(left)].map(node => node.getType())).toEqual(['number']);
      expect([...descendants(binary)]).toHaveLength(4);
    });

    it('should yield nothing for a null node', () => {
      const root = parser.parseString('1').getRootNode();
      expect([...descendants(root.getParent())]).toEqual([]);
    });
  });

  it('should find nodes of one type in document order', () => {
    const source = '1 + 2 * 3';
    const numbers = findNodes(parser.parseString(source).getRootNode(), 'number');
    expect(numbers.map(node => node.getSourceRange(source))).toEqual(['1', '2', '3']);
  });

  it('should find nodes of several types', () => {
    const source = '1 # one\n+ 2';
    const found = findNodesByTypes(parser.parseString(source).getRootNode(), ['comment', '+']);
    expect(found.map(node => node.getSourceRange(source))).toEqual(['# one', '+']);
  });

  it('should return the first match or undefined', () => {
    const root = parser.parseString('1+').getRootNode();
    const missing = findFirst(root, node => node.isMissing());

    expect(missing?.getByteRange()).toEqual({ start: 2, end: 2 });
    expect(findFirst(root, node => node.getType() === 'comment')).toBeUndefined();
  });
});
