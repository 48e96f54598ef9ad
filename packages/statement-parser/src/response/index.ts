export { buildSuccessResponse, buildErrorResponse, buildResponse, serializeResponse } from './response-builder.js';
