export { createFileLogTarget } from './file-target';
