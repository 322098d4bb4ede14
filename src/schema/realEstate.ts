// src/schema/realEstate.ts
// Cascade schema for property-management graphs.
//
//   property ─┬─ owner
//             ├─ documents[]
//             └─ units[] ─┬─ photos[], documents[]
//                         └─ tenants[] ── lease
//
// A lease always carries the (propertyId, unitId, tenantId) triple, so a lease
// written for a unit without tenants gets a placeholder tenant first.

import { config } from "../config";
import type { Ancestor, CascadeSchema, PlaceholderPolicy } from "../graph/entityCascade";
import { appendItems } from "../graph/recursiveMerger";
import { keyString } from "../graph/types";

export interface RealEstateSchemaOptions {
  /** Prefix of placeholder tenant names, `Tenant_` gives `Tenant_B1` */
  placeholderPrefix?: string;
  numericFields?: readonly string[];
}

/** Names a placeholder after the nearest unit: `${prefix}${unitNumber}` */
export function unitPlaceholderName(prefix: string): PlaceholderPolicy {
  return (ancestors: readonly Ancestor[]) => {
    for (let i = ancestors.length - 1; i >= 0; i--) {
      if (ancestors[i].entityType !== "Unit") continue;
      const unitNumber = keyString(ancestors[i].node.unitNumber);
      return unitNumber && unitNumber.trim() !== "" ? `${prefix}${unitNumber}` : null;
    }
    return null;
  };
}

export function createRealEstateSchema(options: RealEstateSchemaOptions = {}): CascadeSchema {
  const prefix = options.placeholderPrefix ?? config.cascade.placeholderTenantPrefix;

  return {
    rootType: "Property",
    collections: {
      property: { entityType: "Property", identifierField: "name", storage: "object" },
      owner: { entityType: "Owner", identifierField: "name", storage: "object" },
      units: {
        entityType: "Unit",
        identifierField: "unitNumber",
        inherits: [{ field: "propertyId", fromType: "Property", fromField: "name" }],
      },
      tenants: { entityType: "Tenant", identifierField: "name" },
      lease: {
        entityType: "Lease",
        identifierField: "id",
        storage: "object",
        inherits: [
          { field: "propertyId", fromType: "Property", fromField: "name" },
          { field: "unitId", fromType: "Unit", fromField: "unitNumber" },
          { field: "tenantId", fromType: "Tenant", fromField: "name" },
        ],
        requiresParent: { collectionKey: "tenants", placeholder: unitPlaceholderName(prefix) },
      },
      documents: { entityType: "Document", identifierField: "id" },
      photos: { entityType: "Photo", identifierField: "id" },
    },
    numericFields: options.numericFields ?? config.cascade.numericFields,
    handlers: {
      photos: appendItems,
      documents: appendItems,
    },
  };
}

export const REAL_ESTATE_SCHEMA = createRealEstateSchema();
