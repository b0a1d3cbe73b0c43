process.env.SUBSTORE_LOG_LEVEL = process.env.SUBSTORE_LOG_LEVEL ?? 'silent'
