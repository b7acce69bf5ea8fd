export { ASTValidator, type ValidatorOptions } from './ast-validator.js';
export {
  CYCLE_HELP,
  CYCLE_MESSAGE,
  StructuralValidator,
} from './structural-validator.js';
export { FullValidator } from './full-validator.js';
