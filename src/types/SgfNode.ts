/**
 * One node of the main line. Property keys are upper-cased identifiers in
 * the order they were first seen; a key repeated inside a node has its
 * values appended to the first occurrence.
 */
export interface SgfNode {
  properties: Record<string, string[]>;
}

export function createSgfNode(): SgfNode {
  return { properties: {} };
}

export function addProperty(node: SgfNode, key: string, values: string[]): void {
  const existing = node.properties[key];
  if (existing) {
    existing.push(...values);
  } else {
    node.properties[key] = [...values];
  }
}
