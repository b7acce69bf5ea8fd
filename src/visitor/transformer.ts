import type { Node } from '../node/types.js';
import { SchemaNode } from '../schema/schema-node.js';
import { BaseVisitor } from './visitor.js';

/**
 * Visitor producing nodes, used to rewrite trees.
 * Kinds without a visit method come back unchanged; override the methods
 * for the kinds being rewritten and call transformChildren to recurse.
 */
export abstract class Transformer extends BaseVisitor<Node> {
  override fallback(node: Node): Node {
    return node;
  }

  /**
   * Rebuild a node with every child passed through visit().
   * Returns the node itself when no child changed or it has no schema.
   */
  transformChildren(node: Node): Node {
    if (!(node instanceof SchemaNode)) {
      return node;
    }
    return node.mapChildren((child) => this.visit(child));
  }
}
