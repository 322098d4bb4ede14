import { describe, it, expect } from 'vitest';
import { createRealEstateSchema, unitPlaceholderName } from '../realEstate.js';
import { upsert } from '../../graph/entityCascade.js';
import type { GraphNode } from '../../graph/types.js';

/* ============= unitPlaceholderName ============= */

describe('unitPlaceholderName', () => {
  const name = unitPlaceholderName('Tenant_');

  it('names the placeholder after the nearest unit', () => {
    expect(
      name([
        { entityType: 'Property', node: { name: 'Maple Court' } },
        { entityType: 'Unit', node: { unitNumber: 'B1' } },
      ])
    ).toBe('Tenant_B1');
  });

  it('returns null without a unit number', () => {
    expect(name([{ entityType: 'Property', node: { name: 'Maple Court' } }])).toBeNull();
    expect(name([{ entityType: 'Unit', node: { unitNumber: ' ' } }])).toBeNull();
  });
});

/* ============= createRealEstateSchema ============= */

describe('createRealEstateSchema', () => {
  it('uses the configured placeholder prefix', () => {
    const schema = createRealEstateSchema({ placeholderPrefix: 'Vacant-' });
    const graph: GraphNode = { name: 'Maple Court', units: [{ unitNumber: 'C3' }] };

    upsert(graph, [{ collectionKey: 'units', identifier: 'C3' }, { collectionKey: 'lease' }], {}, schema);
    expect(graph.units).toEqual([
      {
        unitNumber: 'C3',
        tenants: [
          {
            name: 'Vacant-C3',
            lease: { propertyId: 'Maple Court', unitId: 'C3', tenantId: 'Vacant-C3' },
          },
        ],
      },
    ]);
  });

  it('aborts a lease when no placeholder can be named', () => {
    const schema = createRealEstateSchema();
    const result = upsert({ name: 'Maple Court' }, [{ collectionKey: 'lease' }], {}, schema);
    expect(result.ok === false && result.error.message).toBe(
      'Cascade aborted at level 0 (lease): cannot name a placeholder Tenant'
    );
  });

  it('declares the default numeric fields', () => {
    expect(createRealEstateSchema().numericFields).toEqual(['rentAmount', 'securityDeposit']);
  });
});
