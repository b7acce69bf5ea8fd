export {
  BaseVisitor,
  dispatchVisit,
  visitMethodFor,
  type NodeOf,
  type VisitableDefinition,
  type Visitor,
  type VisitorFor,
} from './visitor.js';
export { Transformer } from './transformer.js';
