/**
 * Global test setup
 *
 * Runs once before the forks start; workers inherit this environment.
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.enableConsoleOutput = 'false'
  process.env.LOG_LEVEL = 'silent'
  process.env.DISCORD_TOKEN = 'test-token'
  process.env.SEERR_URL = 'http://seerr.test'
  process.env.SEERR_API_KEY = 'test-secret'
  process.env.NOTIFICATION_CHANNEL_ID = '900000000000000001'
  process.env.WEBHOOK_AUTH_HEADER = ''
  process.env.DISCORD_GUILD_ID = ''
}

export async function teardown(): Promise<void> {
  try {
    const { cleanupTestDatabases } = await import(
      '../helpers/database-paths.js'
    )
    await cleanupTestDatabases()
  } catch (error) {
    console.error('Failed to clean up test databases:', error)
  }
}
