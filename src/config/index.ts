export * from './env'
export * from './venues'
