/**
 * Context variables shared by middleware and routes
 */

/** Whether the generation cache served an artifact */
export type CacheStatus = 'hit' | 'miss';

export interface AppVariables {
  cacheStatus?: CacheStatus;
}

export type AppEnv = {
  Variables: AppVariables;
};
