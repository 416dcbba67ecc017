import type { AppConfig } from '../config/app-config';
import {
  AirflowApiConnectionStore,
  AirflowUriConnectionStore,
} from './airflow-connection.store';
import type { ConnectionStore } from './connection.types';

/**
 * Airflow checks `AIRFLOW_CONN_*` before its metastore; the same order
 * applies here.
 * Returns null when neither is configured.
 */
export function createConnectionStore(
  config: AppConfig,
): ConnectionStore | null {
  const { connectionId, connectionUri, apiUrl } = config.orchestrator;
  const { apiUser, apiPassword, timeoutMs } = config.orchestrator;

  if (connectionUri) {
    return new AirflowUriConnectionStore(connectionId, connectionUri);
  }
  if (apiUrl) {
    return new AirflowApiConnectionStore({
      baseUrl: apiUrl,
      username: apiUser,
      password: apiPassword,
      timeoutMs,
    });
  }
  return null;
}
