import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'

describe('Config Plugin', () => {
  it('should apply LOG_LEVEL to the service loggers', async (ctx) => {
    const app = await build(ctx, {
      logger: true,
      env: { LOG_LEVEL: 'warn', DEBUG_MODE: 'false' },
    })

    expect(app.log.level).toBe('warn')
    expect(app.db.log.level).toBe('warn')
  })

  it('should put the service loggers at debug in debug mode', async (ctx) => {
    const app = await build(ctx, {
      logger: true,
      env: { DEBUG_MODE: 'true' },
    })

    expect(app.config.logLevel).toBe('debug')
    expect(app.log.level).toBe('debug')
    expect(app.db.log.level).toBe('debug')
  })
})
