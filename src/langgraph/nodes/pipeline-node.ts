import type { NodeLogEntry, NodeName, QueryState } from "../state.js";
import { NodeLogSchema } from "../state.js";
import { isBackwardTransition } from "../flows/routers.js";
import { mergeStatePatch, nowMs } from "../core/helpers/state.js";
import { errorFields, noopLogger, type Logger } from "../../observability/logger.js";

/**
 * Base class for pipeline steps.
 *
 * `invoke` owns the bookkeeping every step shares: the retry charge for a
 * backward edge, `current_node`, `completed_nodes` and the `node_log` timing
 * entry. Subclasses implement `run` and return only the fields they change.
 * An unexpected throw from `run` is logged and turned into `recover`'s patch,
 * so `invoke` always resolves.
 */
export abstract class PipelineNode {
  abstract readonly name: NodeName;

  constructor(protected readonly logger: Logger = noopLogger) {}

  protected abstract run(state: QueryState, logger: Logger): Promise<Partial<QueryState>>;

  protected recover(_state: QueryState, _error: unknown): Partial<QueryState> {
    return {};
  }

  protected logStart(_state: QueryState): { t0: number } {
    return { t0: nowMs() };
  }

  protected logEnd(state: QueryState, t0: number, extra?: Partial<NodeLogEntry>): Pick<QueryState, "node_log"> {
    const entry = NodeLogSchema.parse({
      node_name: this.name,
      start_time: t0,
      end_time: nowMs(),
      ...(extra ?? {}),
    });
    return { node_log: [...state.node_log, entry] };
  }

  async invoke(state: QueryState, logger: Logger = this.logger): Promise<QueryState> {
    const log = logger.child({ node: this.name });
    const entered = isBackwardTransition(state.current_node, this.name)
      ? { ...state, retry_count: state.retry_count + 1 }
      : state;
    const { t0 } = this.logStart(entered);
    log.debug("node start", { retryCount: entered.retry_count });

    let patch: Partial<QueryState>;
    let status: NodeLogEntry["status"] = "ok";
    try {
      patch = await this.run(entered, log);
    } catch (error) {
      log.error("node failed, recovering", errorFields(error));
      patch = this.recover(entered, error);
      status = "recovered";
    }

    const next = mergeStatePatch(entered, patch, {
      current_node: this.name,
      completed_nodes: [...entered.completed_nodes, this.name],
    });
    log.debug("node end", { durationMs: nowMs() - t0, status });
    return mergeStatePatch(next, this.logEnd(next, t0, { status }));
  }
}
