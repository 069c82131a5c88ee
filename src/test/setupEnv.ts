import 'reflect-metadata';

process.env.NODE_ENV = 'test';
process.env.REDIS_URL = 'redis://test-redis:6379/0';
process.env.DOCUMENT_SERVICE_URL = 'http://document-service.test';
