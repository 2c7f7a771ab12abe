// Types
export * from './types/omniparser.types';

// Services
export * from './services/omniparser-client.service';
export * from './services/element-mapper';
export * from './services/perception.service';

// Modules
export * from './cv.module';
