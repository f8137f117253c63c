export { createFilesystemStore, createInMemoryFileStore } from './fs.js';
