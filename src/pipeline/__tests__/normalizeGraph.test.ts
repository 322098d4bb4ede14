import { describe, it, expect, vi } from 'vitest';
import {
  normalizeGraph,
  reconcileGraphs,
  applySourceUpdate,
  type InstructionSource,
  type SourceResponse,
} from '../normalizeGraph.js';
import { sequentialIdGenerator } from '../../graph/idLinker.js';
import { StructuralError } from '../../graph/errors.js';
import { createRealEstateSchema } from '../../schema/realEstate.js';
import type { GraphNode } from '../../graph/types.js';

/* ============= Helpers ============= */

const schema = createRealEstateSchema({ numericFields: ['rentAmount'] });

function fakeSource(response: SourceResponse): InstructionSource {
  return { interpret: vi.fn(async () => response) };
}

function updateRent(unitNumber: string, rentAmount: number): string {
  return JSON.stringify({
    action: 'update',
    entityType: 'Unit',
    identifier: { field: 'unitNumber', value: unitNumber },
    fields: { rentAmount },
  });
}

/* ============= normalizeGraph ============= */

describe('normalizeGraph', () => {
  it('links ids and reports dangling references', () => {
    const result = normalizeGraph(
      { name: 'Maple Court', units: [{ unitNumber: 'B1', leaseId: 'l-missing' }] },
      { idGenerator: sequentialIdGenerator(), skipRoot: true }
    );

    expect(result.graph).toEqual({
      name: 'Maple Court',
      units: [{ id: 'unit-1', unitNumber: 'B1', leaseId: 'l-missing' }],
      unitIds: ['unit-1'],
    });
    expect(result.relationships).toEqual({
      unit: ["unit with ID 'unit-1' references lease with ID 'l-missing'"],
    });
    expect(result.dangling.map((edge) => edge.toId)).toEqual(['l-missing']);
  });
});

/* ============= reconcileGraphs ============= */

describe('reconcileGraphs', () => {
  const base: GraphNode = { id: 'p1', units: [{ id: 'u1', rentAmount: 1200, notes: '' }] };
  const incoming: GraphNode = {
    id: 'p1',
    units: [
      { id: 'u1', rentAmount: 0, securityDeposit: 600 },
      { id: 'u2', propertyId: 'p1' },
    ],
  };

  it('merges, links, compresses and analyses', () => {
    const result = reconcileGraphs(base, incoming, { compress: true });

    expect(result.graph).toEqual({
      id: 'p1',
      units: [
        { id: 'u1', rentAmount: 1200, securityDeposit: 600 },
        { id: 'u2', propertyId: 'p1' },
      ],
      unitIds: ['u1', 'u2'],
    });
    expect(result.relationships).toEqual({
      unit: ["unit with ID 'u2' references property with ID 'p1'"],
    });
    expect(result.dangling).toEqual([]);
  });

  it('keeps empty fields without compression', () => {
    const result = reconcileGraphs(base, incoming);
    const units = result.graph.units;
    expect(Array.isArray(units) && units[0]).toEqual({
      id: 'u1',
      rentAmount: 1200,
      notes: '',
      securityDeposit: 600,
    });
  });

  it('does not modify its inputs', () => {
    reconcileGraphs(base, incoming, { compress: true });
    expect(base).toEqual({ id: 'p1', units: [{ id: 'u1', rentAmount: 1200, notes: '' }] });
  });
});

/* ============= applySourceUpdate ============= */

describe('applySourceUpdate', () => {
  const graph: GraphNode = {
    id: 'p1',
    name: 'Maple Court',
    units: [{ id: 'u1', unitNumber: 'B1', rentAmount: 900 }],
  };

  it('passes the text and current graph to the source', async () => {
    const source = fakeSource({ kind: 'instructions', instructions: [] });
    await applySourceUpdate(graph, source, 'Rent for B1 is now 1000', { schema });
    expect(source.interpret).toHaveBeenCalledWith({ text: 'Rent for B1 is now 1000', graph });
  });

  it('applies structured instructions', async () => {
    const source = fakeSource({ kind: 'instructions', instructions: [JSON.parse(updateRent('B1', 1000))] });
    const result = await applySourceUpdate(graph, source, 'Rent for B1 is now 1000', { schema });

    expect(result.success).toBe(true);
    expect(result.messages).toEqual(['Updated Unit with unitNumber=B1']);
    expect(result.graph).toEqual({
      id: 'p1',
      name: 'Maple Court',
      units: [{ id: 'u1', unitNumber: 'B1', rentAmount: 1000 }],
      unitIds: ['u1'],
    });
  });

  it('reads numbered JSON lines from text and keeps the rest aside', async () => {
    const text = `1. ${updateRent('B1', 1100)}\n2. Call the plumber`;
    const result = await applySourceUpdate(graph, fakeSource({ kind: 'text', text }), 'plumbing', { schema });

    expect(result.success).toBe(false);
    expect(result.unparsed).toEqual(['Call the plumber']);
    expect(result.failedInstructions).toEqual([]);
    const units = result.graph.units;
    expect(Array.isArray(units) && units[0]).toEqual({ id: 'u1', unitNumber: 'B1', rentAmount: 1100 });
  });

  it('treats malformed JSON lines as unparsed', async () => {
    const result = await applySourceUpdate(graph, fakeSource({ kind: 'text', text: '1. {"action": ' }), 'x', {
      schema,
    });
    expect(result.unparsed).toEqual(['{"action":']);
    expect(result.messages).toEqual([]);
  });

  it('reconciles a replacement graph', async () => {
    const source = fakeSource({
      kind: 'graph',
      graph: { id: 'p1', name: 'Maple Ct', owner: { id: 'o1', name: 'Ada' } },
    });
    const result = await applySourceUpdate(graph, source, 'Ada owns Maple Court');

    expect(result.success).toBe(true);
    expect(result.messages).toEqual(['Reconciled graph returned by source']);
    expect(result.graph).toEqual({
      id: 'p1',
      name: 'Maple Court',
      units: [{ id: 'u1', unitNumber: 'B1', rentAmount: 900 }],
      unitIds: ['u1'],
      owner: { id: 'o1', name: 'Ada' },
      ownerId: 'o1',
    });
  });

  it('rejects a replacement that is not an object', async () => {
    const notAGraph: GraphNode = JSON.parse('[]');
    const source = fakeSource({ kind: 'graph', graph: notAGraph });
    await expect(applySourceUpdate(graph, source, 'x')).rejects.toThrow(StructuralError);
  });
});
