export { PathExpression } from './expression';
export { PathSyntaxError } from './errors';
