export {
  CounterSnapshotStore,
  type CounterSnapshot,
  type SnapshotState,
  type SnapshotStatus,
} from './CounterSnapshotStore';
export * from './KpiReportService';
