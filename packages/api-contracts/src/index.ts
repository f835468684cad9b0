export * from './common/enums.js';
export * from './common/parsing.js';
export * from './common/responses.js';

export * from './entities/image.js';

export * from './endpoints/images/upload.js';
export * from './endpoints/images/thumbnail.js';
export * from './endpoints/images/base64.js';
export * from './endpoints/maintenance/cleanup.js';
