/* packages/shape/test/resolver.spec.ts */
import { describe, it, expect } from 'vitest';
import { conventionKey, resolveField, spokenForm } from '../src/index.js';

describe('resolveField', () => {
  it('matches exact keys without warnings', () => {
    expect(resolveField('/price', { price: 1 })).toEqual({
      originalField: '/price',
      resolvedField: 'price',
      resolvedPath: '/price',
      wasResolved: true,
      via: 'exact',
      warnings: []
    });
  });

  it('accepts bare names', () => {
    const r = resolveField('price', { price: 1 });
    expect(r.resolvedPath).toBe('/price');
    expect(r.via).toBe('exact');
  });

  it('falls back to a case-insensitive match', () => {
    const r = resolveField('Price', { price: 1 });
    expect(r.resolvedField).toBe('price');
    expect(r.via).toBe('case');
    expect(r.warnings).toEqual(["Field 'Price' resolved to '/price' (case)"]);
  });

  it('ignores accents in the case-insensitive step', () => {
    const r = resolveField('preco', { 'Preço': 10 });
    expect(r.resolvedField).toBe('Preço');
    expect(r.via).toBe('case');
  });

  it('uses the alias table in both directions', () => {
    expect(resolveField('name', { nome: 'Ana', idade: 3 }).resolvedField).toBe('nome');
    expect(resolveField('nome', { name: 'Ana' }).resolvedField).toBe('name');
    const r = resolveField('price', { 'preço': 1 });
    expect(r.resolvedField).toBe('preço');
    expect(r.via).toBe('alias');
  });

  it('prefers an exact key over an alias', () => {
    expect(resolveField('valor', { price: 2, valor: 1 }).via).toBe('exact');
  });

  it('matches across naming conventions', () => {
    const r = resolveField('unit_price', { unitPrice: 2 });
    expect(r.resolvedField).toBe('unitPrice');
    expect(r.via).toBe('convention');
  });

  it('resolves nested pointers segment by segment', () => {
    const r = resolveField('/address/City', { address: { city: 'Lisboa' } });
    expect(r.resolvedPath).toBe('/address/city');
    expect(r.resolvedField).toBe('city');
    expect(r.via).toBe('case');
  });

  it('returns the reference unchanged when nothing matches', () => {
    expect(resolveField('/foo', { a: 1 })).toEqual({
      originalField: '/foo',
      resolvedField: 'foo',
      resolvedPath: '/foo',
      wasResolved: false,
      via: 'none',
      warnings: ["Field '/foo' not found in sample row"]
    });
  });

  it('does not descend into non-objects', () => {
    const r = resolveField('/a/b', { a: 1 });
    expect(r.wasResolved).toBe(false);
    expect(r.warnings).toEqual(["Field '/a/b' not found: '/a' is not an object"]);
  });
});

describe('naming helpers', () => {
  it('collapses conventions', () => {
    expect(conventionKey('Unit-Price')).toBe('unitprice');
    expect(conventionKey('unit_price')).toBe('unitprice');
  });

  it('spells identifiers as words', () => {
    expect(spokenForm('unitPrice')).toBe('unit price');
    expect(spokenForm('order_total')).toBe('order total');
    expect(spokenForm('name')).toBe('name');
  });
});
