import { EffectRunner, type EffectDeps } from "./effects";
import { createResolvers, type Resolver, type ResolverDeps } from "./resolvers";
import { HANDLERS, cancelConversation } from "./stages";
import {
  NO_INPUT,
  NO_RESULT,
  TERMINAL_STAGES,
  type ConversationState,
  type Effect,
  type EffectFailure,
  type HandlerContext,
  type Stage,
  type StageInput,
  type TurnResult,
} from "./types";

// Longest input-free run is greeting/identify and confirm/distribute/remind/done
const MAX_PASSES = 10;

export type MachineDeps = ResolverDeps & Omit<EffectDeps, "store" | "engine">;

/**
 * Drives one conversation turn: resolve, handle, run effects, and keep
 * advancing while the next stage needs no user input.
 */
export class ConversationMachine {
  private readonly ctx: HandlerContext;

  constructor(
    private readonly resolvers: Partial<Record<Stage, Resolver>>,
    private readonly runner: EffectRunner,
    maxAlternativeOffers: number,
  ) {
    this.ctx = { maxAlternativeOffers };
  }

  async turn(state: ConversationState, input: StageInput): Promise<TurnResult> {
    const effects: Effect[] = [];
    const failures: EffectFailure[] = [];

    if (input.kind === "cancel") {
      const outcome = cancelConversation(state, input.reason);
      effects.push(...outcome.effects);
      failures.push(...(await this.runner.runAll(outcome.effects)));
      return summarize(outcome.state, effects, failures);
    }

    let current = state;
    let stageInput: StageInput = input;

    for (let pass = 0; pass < MAX_PASSES; pass++) {
      const stage = current.stage;
      const resolver = this.resolvers[stage];
      const result = resolver ? await resolver(current, stageInput) : NO_RESULT;
      const outcome = HANDLERS[stage](current, stageInput, result, this.ctx);

      effects.push(...outcome.effects);
      failures.push(...(await this.runner.runAll(outcome.effects)));
      current = outcome.state;

      if (current.stage === stage || TERMINAL_STAGES.includes(current.stage)) {
        return summarize(current, effects, failures);
      }
      stageInput = NO_INPUT;
    }

    console.warn(`[conversation] stopped advancing after ${MAX_PASSES} passes at ${current.stage}`);
    return summarize(current, effects, failures);
  }

  /** Opening turn of a fresh conversation. */
  start(state: ConversationState): Promise<TurnResult> {
    return this.turn(state, NO_INPUT);
  }
}

function summarize(
  state: ConversationState,
  effects: Effect[],
  failures: EffectFailure[],
): TurnResult {
  const replies = effects.flatMap((e) => (e.type === "reply" ? [e.text] : []));
  return { state, replies, effects, failures };
}

export function createConversationMachine(deps: MachineDeps): ConversationMachine {
  const runner = new EffectRunner({
    store: deps.store,
    engine: deps.engine,
    transport: deps.transport,
    forms: deps.forms,
    admin: deps.admin,
    reminders: deps.reminders,
    publicUrl: deps.publicUrl,
  });
  return new ConversationMachine(
    createResolvers(deps),
    runner,
    deps.settings.maxAlternativeOffers,
  );
}
