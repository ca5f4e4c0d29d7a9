export {
  RedisSessionCache,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
} from "./RedisSessionCache";

export type { RedisClientWrapper } from "./internal/redisClient";
export { classifyRedisError } from "./internal/redisErrors";
