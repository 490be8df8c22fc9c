// Keep test output quiet; individual tests can still raise the level with SyncLogger.setLevel()
process.env.SYNC_LOG_LEVEL = 'silent';
