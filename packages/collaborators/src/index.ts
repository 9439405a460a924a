export * from './token';
export * from './oracle';
export * from './legacy-a';
export * from './legacy-b';
export * from './applications';
export * from './fixture';
