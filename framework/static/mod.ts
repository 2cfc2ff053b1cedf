/**
 * Static Files
 */

export { fileServer, serveFile, stripPrefix, contentTypeFor } from './file_server.ts';
