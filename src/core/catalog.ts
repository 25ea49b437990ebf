/**
 * Catalog Extractor
 * Flattens the nested KMS product database into display name -> key -> commands.
 *
 * The database nests products at no fixed depth: lists of groups, groups with
 * KmsItems, KMS items with SkuItems, SKUs carrying Gvlk + DisplayName. Each node
 * is classified once and the traversal dispatches on the result.
 */

import { logger } from '../utils/logger.js';
import { ExtractionSkip } from './errors.js';
import type { Catalog, CommandGenerator, DatabaseNode, ProductCatalogEntry } from '../types/index.js';

const CHILD_ITEMS_KEY = 'KmsItems';
const SUB_ITEMS_KEY = 'SkuItems';
const LICENSE_KEY_FIELD = 'Gvlk';
const DISPLAY_NAME_FIELD = 'DisplayName';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classify a raw node by shape. Recognized keys are checked in priority
 * order, so a node with KmsItems is never read as a product.
 */
export function classifyNode(node: unknown): DatabaseNode {
  if (Array.isArray(node)) {
    return { kind: 'sequence', items: node };
  }
  if (!isRecord(node)) {
    return { kind: 'ignored' };
  }
  if (CHILD_ITEMS_KEY in node) {
    return { kind: 'container', key: CHILD_ITEMS_KEY, children: node[CHILD_ITEMS_KEY] };
  }
  if (SUB_ITEMS_KEY in node) {
    return { kind: 'container', key: SUB_ITEMS_KEY, children: node[SUB_ITEMS_KEY] };
  }
  if (LICENSE_KEY_FIELD in node && DISPLAY_NAME_FIELD in node) {
    const licenseKey = node[LICENSE_KEY_FIELD];
    if (typeof licenseKey !== 'string' || licenseKey === '') {
      return { kind: 'ignored' };
    }
    return {
      kind: 'product',
      display_name: String(node[DISPLAY_NAME_FIELD]),
      license_key: licenseKey
    };
  }
  return { kind: 'ignored' };
}

/**
 * Walk the database depth-first and build the catalog.
 * Later entries with the same display name replace earlier ones.
 * A subtree that throws is logged and skipped; the rest of the walk continues.
 */
export function extractCatalog(root: unknown, generate: CommandGenerator): Catalog {
  const catalog: Catalog = new Map();
  let skipped = 0;

  const visit = (node: unknown, path: string): void => {
    try {
      const classified = classifyNode(node);
      switch (classified.kind) {
        case 'sequence':
          classified.items.forEach((item, index) => visit(item, `${path}[${index}]`));
          break;
        case 'container':
          visit(classified.children, `${path}.${classified.key}`);
          break;
        case 'product':
          catalog.set(classified.display_name, {
            display_name: classified.display_name,
            license_key: classified.license_key,
            commands: generate(classified.display_name, classified.license_key)
          });
          break;
        case 'ignored':
          break;
      }
    } catch (error) {
      skipped++;
      const skip = new ExtractionSkip(path, error);
      logger.warn(skip.message, { code: skip.code, path });
    }
  };

  visit(root, '$');

  logger.debug('Catalog extracted', { products: catalog.size, skipped });
  return catalog;
}

/** Catalog as an array, in insertion order */
export function catalogToArray(catalog: Catalog): ProductCatalogEntry[] {
  return Array.from(catalog.values());
}
