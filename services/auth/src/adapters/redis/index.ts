export { getRedisClient, closeRedisClient } from './client';
export { createRedisEphemeralStore } from './ephemeralStore';
