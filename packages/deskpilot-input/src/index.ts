export * from './nut/key-mapping';
export * from './nut/nut.service';
export * from './nut/nut.module';
