export { default as convertCommand } from './convertCommand';
export { default as indexCommand } from './indexCommand';
