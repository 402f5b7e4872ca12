export { createCuidRouter, cuidErrorHandler } from './http.handler';
