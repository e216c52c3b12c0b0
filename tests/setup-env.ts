process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.DATABASE_URL = ':memory:';
process.env.JWT_SECRET = 'test-secret';
process.env.ADMIN_API_KEY = 'test-admin-key';
process.env.BCRYPT_ROUNDS = '4';
process.env.REDIS_URL = '';
process.env.APP_URL = 'http://localhost:3000';
