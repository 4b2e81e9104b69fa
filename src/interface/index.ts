export * from './host-attributes.interface';
export * from './module-async-options.interface';
export * from './module-options.interface';
export * from './parameter-source.interface';
export * from './resolution-report.interface';
