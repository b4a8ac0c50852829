export * from './core';
export * from './ops';
export * from './kubernetes';
export * from './constructs';
export * from './service-mesh';
export * from './pebble';
export * from './relations';
export * from './charm';
