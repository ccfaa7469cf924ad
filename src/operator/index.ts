export { Operator, type OperatorOptions } from './operator.js';
export { BlockingOperator } from './blocking-operator.js';
export { Lister, BlockingLister } from './lister.js';
export {
  File,
  BlockingFile,
  DEFAULT_WRITE_BUFFER_SIZE,
  DEFAULT_READ_AHEAD,
  type SeekWhence,
} from './file.js';
