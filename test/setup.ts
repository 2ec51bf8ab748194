/**
 * Global setup for unit and E2E suites.
 * Decorated providers need the metadata polyfill before they load.
 */
import 'reflect-metadata'

process.env.NODE_ENV = 'test'
