import type { RebalanceStrategy } from '../coordinator/interfaces';
import type { NodeDefinition } from '../generator/interfaces';
import type { RegistrationState } from '../registration/interfaces';
import type { ReportedError } from '../shared/error.utils';
import type { NodeIdentity, NodeRole, Topology } from '../topology/interfaces';

export type LifecycleOperation = 'converge' | 'add-worker' | 'remove-worker' | 'resize';

export type OverallResult = 'Converged' | 'PartiallyConverged' | 'Failed';

/**
 * Per-node state in a report. Workers move through the registration states; the
 * coordinator is only ever Running, Stopped or Failed.
 */
export type NodeState = RegistrationState | 'Running' | 'Stopped';

export interface NodeReport {
  name: string;
  role: NodeRole;
  identity: NodeIdentity;
  targetState: NodeState;
  achievedState: NodeState;
  /** register commands issued for this worker in this operation */
  attempts?: number;
  /** Drain was skipped; shard placements on the node may be lost. */
  forced?: boolean;
  error?: ReportedError;
  warnings?: string[];
}

export interface RebalanceReport {
  strategy: RebalanceStrategy;
  /** `null` when the coordinator had nothing to move. */
  jobId: string | null;
  error?: ReportedError;
}

export interface RejectionReport {
  code: string;
  violations: string[];
}

export interface OperationReport {
  operation: LifecycleOperation;
  overall: OverallResult;
  perNode: NodeReport[];
  elapsedMs: number;
  planHash?: string;
  /** The plan hash matched the last applied one; nothing was touched. */
  unchanged?: boolean;
  /** Present when the topology was refused before any side effect. */
  rejected?: RejectionReport;
  rebalance?: RebalanceReport;
  warnings: string[];
}

export interface ConvergeOptions {
  /** Remove nodes dropped from the topology without draining them. */
  forceRemoval?: boolean;
  /** Start a rebalance once new workers are registered; defaults to SHP_REBALANCE_ON_ADD. */
  rebalance?: boolean;
  signal?: AbortSignal;
}

export interface RemoveWorkerOptions {
  force?: boolean;
  signal?: AbortSignal;
}

export interface AppliedPlan {
  hash: string;
  topology: Topology;
  nodes: NodeDefinition[];
  appliedAt: string;
}

export interface ExportedPlanDocument {
  hash: string;
  contentType: string;
  body: string;
}

export interface ClusterNodeView {
  name: string;
  role: NodeRole;
  host: string;
  port: number;
  /** Supervisor status; `Unknown` when the supervisor does not know the node. */
  status: 'Running' | 'Stopped' | 'Unknown';
  /** Listed by the coordinator's live node list. */
  registered: boolean;
  active: boolean;
}

export interface ClusterNodesView {
  clusterName: string;
  coordinatorReachable: boolean;
  supervisorReachable: boolean;
  nodes: ClusterNodeView[];
}
