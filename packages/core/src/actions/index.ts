export { compileAction, applySudo, describeAction } from './compile.js';
export { quoteArg, quoteArgv } from './quote.js';
export { executeOrThrow, executeSequence } from './execute.js';
