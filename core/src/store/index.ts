export * from './types';
export * from './memory';
export * from './file';
export { assertConsistent, assertTransition, assertWritable } from './guard';
