import { describe, it, expect } from 'vitest';
import { upsert, upsertMany, collectionFor } from '../entityCascade.js';
import { CascadeAbortError, StructuralError } from '../errors.js';
import { createRealEstateSchema } from '../../schema/realEstate.js';
import type { GraphNode } from '../types.js';

/* ============= Helpers ============= */

const schema = createRealEstateSchema({
  placeholderPrefix: 'Tenant_',
  numericFields: ['rentAmount', 'securityDeposit'],
});

function property(overrides: GraphNode = {}): GraphNode {
  return { name: 'Maple Court', units: [], ...overrides };
}

/* ============= Creation ============= */

describe('upsert: creating missing levels', () => {
  it('creates a unit and tenant with inherited keys', () => {
    const graph = property();
    const result = upsert(
      graph,
      [
        { collectionKey: 'units', identifier: 'B1' },
        { collectionKey: 'tenants', identifier: 'Bob' },
      ],
      { phone: '5550100' },
      schema
    );

    expect(result.ok).toBe(true);
    expect(graph.units).toEqual([
      {
        unitNumber: 'B1',
        propertyId: 'Maple Court',
        tenants: [{ name: 'Bob', phone: '5550100' }],
      },
    ]);
    if (!result.ok) return;
    expect(result.graph).toBe(graph);
    expect(result.node).toEqual({ name: 'Bob', phone: '5550100' });
    expect(result.created).toEqual([
      { entityType: 'Unit', collectionKey: 'units', identifier: 'B1', placeholder: false },
      { entityType: 'Tenant', collectionKey: 'tenants', identifier: 'Bob', placeholder: false },
    ]);
  });

  it('starts a list when the collection key is absent', () => {
    const graph: GraphNode = { name: 'Maple Court' };
    upsert(graph, [{ collectionKey: 'units', identifier: 'C2' }], {}, schema);
    expect(graph.units).toEqual([{ unitNumber: 'C2', propertyId: 'Maple Court' }]);
  });

  it('creates a placeholder tenant before a lease', () => {
    const graph = property({ units: [{ unitNumber: 'B1' }] });
    const result = upsert(
      graph,
      [{ collectionKey: 'units', identifier: 'B1' }, { collectionKey: 'lease' }],
      { startDate: '2025-01-01' },
      schema
    );

    expect(graph.units).toEqual([
      {
        unitNumber: 'B1',
        tenants: [
          {
            name: 'Tenant_B1',
            lease: {
              propertyId: 'Maple Court',
              unitId: 'B1',
              tenantId: 'Tenant_B1',
              startDate: '2025-01-01',
            },
          },
        ],
      },
    ]);
    expect(result.ok && result.created).toEqual([
      { entityType: 'Tenant', collectionKey: 'tenants', identifier: 'Tenant_B1', placeholder: true },
      { entityType: 'Lease', collectionKey: 'lease', identifier: null, placeholder: false },
    ]);
  });

  it('puts a lease under the first existing tenant', () => {
    const graph = property({ units: [{ unitNumber: 'B1', tenants: [{ name: 'Ann' }, { name: 'Ben' }] }] });
    upsert(
      graph,
      [{ collectionKey: 'units', identifier: 'B1' }, { collectionKey: 'lease' }],
      { term: 12 },
      schema
    );
    expect(graph.units).toEqual([
      {
        unitNumber: 'B1',
        tenants: [
          { name: 'Ann', lease: { propertyId: 'Maple Court', unitId: 'B1', tenantId: 'Ann', term: 12 } },
          { name: 'Ben' },
        ],
      },
    ]);
  });

  it('reports the position of an entity appended to a pre-filled list', () => {
    const withFactory = { ...schema, nodeFactories: { Unit: () => ({ tenants: [{ name: 'Ann' }] }) } };
    const graph = property();
    const result = upsert(
      graph,
      [
        { collectionKey: 'units', identifier: 'B1' },
        { collectionKey: 'tenants', identifier: 'Bob' },
      ],
      { rentAmount: 'n/a' },
      withFactory
    );

    expect(result.ok && result.warnings.map((w) => w.path)).toEqual(['$.units[0].tenants[1].rentAmount']);
    expect(graph.units).toEqual([
      {
        tenants: [{ name: 'Ann' }, { name: 'Bob', rentAmount: 'n/a' }],
        unitNumber: 'B1',
        propertyId: 'Maple Court',
      },
    ]);
  });

  it('honours a per-segment identifier field', () => {
    const graph = property({ units: [{ id: 'u7', unitNumber: 'B1' }] });
    const result = upsert(
      graph,
      [{ collectionKey: 'units', identifier: 'u7', identifierField: 'id' }],
      { status: 'occupied' },
      schema
    );
    expect(result.ok && result.created).toEqual([]);
    expect(graph.units).toEqual([{ id: 'u7', unitNumber: 'B1', status: 'occupied' }]);
  });
});

/* ============= Updating ============= */

describe('upsert: updating existing entities', () => {
  it('resolves approximate identifiers and coerces numeric fields', () => {
    const graph = property({ units: [{ unitNumber: 'B1', tenants: [{ name: 'Bob' }] }] });
    const result = upsert(
      graph,
      [
        { collectionKey: 'units', identifier: 'b1' },
        { collectionKey: 'tenants', identifier: 'BOB' },
      ],
      { rentAmount: '1,200' },
      schema
    );

    expect(result.ok && result.created).toEqual([]);
    expect(graph.units).toEqual([{ unitNumber: 'B1', tenants: [{ name: 'Bob', rentAmount: 1200 }] }]);
  });

  it('appends photos through the schema handler', () => {
    const graph = property({ units: [{ unitNumber: 'B1', photos: ['front.jpg'] }] });
    upsert(graph, [{ collectionKey: 'units', identifier: 'B1' }], { photos: 'back.jpg' }, schema);
    expect(graph.units).toEqual([{ unitNumber: 'B1', photos: ['front.jpg', 'back.jpg'] }]);
  });

  it('returns coercion warnings', () => {
    const graph = property({ units: [{ unitNumber: 'B1' }] });
    const result = upsert(
      graph,
      [{ collectionKey: 'units', identifier: 'B1' }],
      { securityDeposit: 'one month' },
      schema
    );
    expect(result.ok && result.warnings.map((w) => w.path)).toEqual(['$.units[0].securityDeposit']);
  });
});

/* ============= Aborts ============= */

describe('upsert: aborts', () => {
  it('aborts on an ambiguous reference', () => {
    const graph = property({ units: [{ unitNumber: 'North A' }, { unitNumber: 'South A' }] });
    const result = upsert(
      graph,
      [
        { collectionKey: 'units', identifier: 'East A' },
        { collectionKey: 'tenants', identifier: 'Bob' },
      ],
      {},
      schema
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CascadeAbortError);
    expect(result.error.level).toBe(0);
    expect(result.error.message).toBe(
      'Cascade aborted at level 0 (units): ambiguous reference unitNumber="East A" matches "North A", "South A"'
    );
  });

  it('leaves the graph untouched when a later level fails', () => {
    const graph = property();
    const before = structuredClone(graph);
    const result = upsert(
      graph,
      [
        { collectionKey: 'units', identifier: 'B9' },
        { collectionKey: 'garages', identifier: 'G1' },
      ],
      { spaces: 2 },
      schema
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.level).toBe(1);
    expect(result.error.segment).toEqual({ collectionKey: 'garages', identifier: 'G1' });
    expect(result.error.message).toBe('Cascade aborted at level 1 (garages): unknown collection key "garages"');
    expect(graph).toEqual(before);
  });

  it('aborts on an empty identifier for a list collection', () => {
    const result = upsert(property(), [{ collectionKey: 'units', identifier: '  ' }], {}, schema);
    expect(result.ok === false && result.error.message).toBe(
      'Cascade aborted at level 0 (units): empty identifier for Unit.unitNumber'
    );
  });

  it('aborts when the collection key holds a scalar', () => {
    const result = upsert({ units: 'none' }, [{ collectionKey: 'units', identifier: 'B1' }], {}, schema);
    expect(result.ok === false && result.error.message).toBe(
      'Cascade aborted at level 0 (units): field "units" holds a scalar, not a collection'
    );
  });

  it('aborts when a single-entity slot holds someone else', () => {
    const graph: GraphNode = { owner: { name: 'Ada' } };
    const result = upsert(graph, [{ collectionKey: 'owner', identifier: 'Grace' }], {}, schema);
    expect(result.ok === false && result.error.message).toBe(
      'Cascade aborted at level 0 (owner): slot "owner" already holds a different Owner'
    );
    expect(graph).toEqual({ owner: { name: 'Ada' } });
  });

  it('throws StructuralError for an empty path', () => {
    expect(() => upsert(property(), [], {}, schema)).toThrow(StructuralError);
  });
});

/* ============= upsertMany ============= */

describe('upsertMany', () => {
  it('keeps successful requests and reports failures', () => {
    const graph = property({ units: [{ unitNumber: 'B1' }] });
    const batch = upsertMany(
      graph,
      [
        { path: [{ collectionKey: 'units', identifier: 'B1' }], fields: { rentAmount: 1000 } },
        { path: [{ collectionKey: 'units', identifier: '' }], fields: {} },
        {
          path: [
            { collectionKey: 'units', identifier: 'B1' },
            { collectionKey: 'tenants', identifier: 'Bob' },
          ],
          fields: {},
        },
      ],
      schema
    );

    expect(batch.success).toBe(false);
    expect(batch.failed.map((f) => f.index)).toEqual([1]);
    expect(batch.messages).toEqual([
      'Updated units[B1]',
      'Cascade aborted at level 0 (units): empty identifier for Unit.unitNumber',
      'Updated units[B1] > tenants[Bob]',
    ]);
    expect(graph.units).toEqual([{ unitNumber: 'B1', rentAmount: 1000, tenants: [{ name: 'Bob' }] }]);
  });
});

/* ============= collectionFor ============= */

describe('collectionFor', () => {
  it('finds declared collections by entity type', () => {
    expect(collectionFor(schema, 'tenant').collectionKey).toBe('tenants');
    expect(collectionFor(schema, 'Lease').rule.storage).toBe('object');
  });

  it('falls back to the plural key identified by id', () => {
    expect(collectionFor(schema, 'Inspection')).toEqual({
      collectionKey: 'inspections',
      rule: { entityType: 'Inspection', identifierField: 'id' },
    });
  });
});
