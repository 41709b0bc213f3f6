export * from './transferFormat';
export * from './transferFileWriter';
export * from './transferFileReader';
