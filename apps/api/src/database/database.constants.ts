export const PG_POOL = 'PG_POOL';

// 저장소 생존 확인(ping) 제한 시간
export const PROBE_TIMEOUT_MS = 5000;
