export {
  findAll,
  findFirst,
  iteratePreorder,
  levelOrder,
  postorder,
  preorder,
  withDepth,
  type DepthVisitFn,
  type VisitFn,
} from './tree-walk.js';
