import { describe, it, expect } from 'vitest';
import {
  addToSelection,
  clearSelection,
  flattenSelection,
  groupFlattened,
  removeFromSelection,
  selectionSize,
} from '../selection.store.js';
import { EMPTY_SELECTION } from '../selection.types.js';

describe('selection store', () => {
  it('round-trips a single equity through add, flatten and remove', () => {
    const tree = addToSelection(EMPTY_SELECTION, 'Europe', 'DAX (Germany)', ['SAP.DE'], () => 'SAP SE');

    expect(tree).toEqual({
      Europe: { 'DAX (Germany)': [{ symbol: 'SAP.DE', label: 'SAP SE' }] },
    });
    expect([...flattenSelection(tree)]).toEqual([
      { region: 'Europe', category: 'DAX (Germany)', symbol: 'SAP.DE', label: 'SAP SE' },
    ]);
    expect(removeFromSelection(tree, 'Europe', 'DAX (Germany)', ['SAP.DE'])).toEqual({});
  });

  it('labels with the symbol when no label function is given', () => {
    const tree = addToSelection(EMPTY_SELECTION, 'United States', 'S&P 500', ['AAPL']);
    expect(tree['United States']['S&P 500']).toEqual([{ symbol: 'AAPL', label: 'AAPL' }]);
  });

  it('ignores duplicate symbols', () => {
    const once = addToSelection(EMPTY_SELECTION, 'Asia', 'Nikkei', ['7203.T', '7203.T']);
    const twice = addToSelection(once, 'Asia', 'Nikkei', ['7203.T']);

    expect(once.Asia.Nikkei).toHaveLength(1);
    expect(twice).toBe(once);
  });

  it('never creates an empty region or category', () => {
    expect(addToSelection(EMPTY_SELECTION, 'Europe', 'CAC 40', [])).toEqual({});
  });

  it('prunes the category, then the region, as entries go', () => {
    let tree = addToSelection(EMPTY_SELECTION, 'Europe', 'DAX', ['SAP.DE', 'SIE.DE']);
    tree = addToSelection(tree, 'Europe', 'CAC 40', ['MC.PA']);

    tree = removeFromSelection(tree, 'Europe', 'DAX', ['SAP.DE']);
    expect(Object.keys(tree.Europe)).toEqual(['DAX', 'CAC 40']);

    tree = removeFromSelection(tree, 'Europe', 'DAX', ['SIE.DE']);
    expect(Object.keys(tree.Europe)).toEqual(['CAC 40']);

    tree = removeFromSelection(tree, 'Europe', 'CAC 40', ['MC.PA']);
    expect(tree).toEqual({});
  });

  it('treats removal of something absent as a no-op', () => {
    const tree = addToSelection(EMPTY_SELECTION, 'Europe', 'DAX', ['SAP.DE']);

    expect(removeFromSelection(tree, 'Asia', 'Nikkei', ['7203.T'])).toBe(tree);
    expect(removeFromSelection(tree, 'Europe', 'DAX', ['BMW.DE'])).toBe(tree);
  });

  it('does not mutate its input', () => {
    const tree = addToSelection(EMPTY_SELECTION, 'Europe', 'DAX', ['SAP.DE']);
    addToSelection(tree, 'Europe', 'DAX', ['BMW.DE']);
    removeFromSelection(tree, 'Europe', 'DAX', ['SAP.DE']);

    expect(tree).toEqual({ Europe: { DAX: [{ symbol: 'SAP.DE', label: 'SAP.DE' }] } });
  });

  it('flattens in region, category, list order and can be iterated again', () => {
    let tree = addToSelection(EMPTY_SELECTION, 'United States', 'S&P 500', ['AAPL', 'MSFT']);
    tree = addToSelection(tree, 'Europe', 'DAX', ['SAP.DE']);
    tree = addToSelection(tree, 'United States', 'NASDAQ', ['AMD']);

    const flat = flattenSelection(tree);
    const symbols = () => [...flat].map((e) => e.symbol);

    expect(symbols()).toEqual(['AAPL', 'MSFT', 'AMD', 'SAP.DE']);
    expect(symbols()).toEqual(['AAPL', 'MSFT', 'AMD', 'SAP.DE']);
    expect(selectionSize(tree)).toBe(4);
  });

  it('regroups flattened entries by region and category', () => {
    let tree = addToSelection(EMPTY_SELECTION, 'United States', 'S&P 500', ['AAPL']);
    tree = addToSelection(tree, 'United States', 'NASDAQ', ['AMD']);
    tree = addToSelection(tree, 'Europe', 'DAX', ['SAP.DE']);

    const groups = groupFlattened(flattenSelection(tree));

    expect(groups.map((g) => g.region)).toEqual(['United States', 'Europe']);
    expect(groups[0].categories.map((c) => c.category)).toEqual(['S&P 500', 'NASDAQ']);
    expect(groups[1].categories[0].entries.map((e) => e.symbol)).toEqual(['SAP.DE']);
  });

  it('clears to the empty tree', () => {
    expect(clearSelection()).toEqual({});
  });

  it('treats names of built-in object members as ordinary keys', () => {
    const tree = addToSelection(EMPTY_SELECTION, 'constructor', 'name', ['X']);
    expect([...flattenSelection(tree)]).toEqual([
      { region: 'constructor', category: 'name', symbol: 'X', label: 'X' },
    ]);
    expect(removeFromSelection(tree, 'constructor', 'name', ['X'])).toEqual({});

    const proto = addToSelection(EMPTY_SELECTION, '__proto__', 'toString', ['Y']);
    expect([...flattenSelection(proto)]).toEqual([
      { region: '__proto__', category: 'toString', symbol: 'Y', label: 'Y' },
    ]);
    expect(removeFromSelection(proto, '__proto__', 'toString', ['Y'])).toEqual({});

    expect(removeFromSelection(EMPTY_SELECTION, 'toString', 'valueOf', ['Z'])).toBe(EMPTY_SELECTION);
  });
});
