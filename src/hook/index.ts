export * from './logHook'
