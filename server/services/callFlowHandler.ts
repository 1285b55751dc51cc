import { patientInfoSchema, type ClinicConfig } from '@shared/schema';
import type { CallState, InboundTurnEvent, TurnRecord, TurnResponse } from '../types/call-state';
import type { EntityExtractor } from '../ai/extractor';
import type { AvailabilityResolver } from './availability';
import { KeyedLock } from '../utils/keyed-lock';
import {
  buildExtractionContext,
  createCallState,
  planTurn,
  resolveCommit,
  resolveLookup,
  resolveSearch,
  transitionTo,
  type PlanContext,
  type TurnPlan,
} from './state-machine';
import * as prompts from './prompts';

// ═══════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════

export interface CallFlowOptions {
  retryBudget: number;
  horizonDays: number;
  inactivityMinutes: number;
  historyLimit: number;
}

export interface CallFlowDeps {
  config: ClinicConfig;
  extractor: EntityExtractor;
  resolver: AvailabilityResolver;
  clock?: () => Date;
  options?: Partial<CallFlowOptions>;
}

type EffectPlan = Exclude<TurnPlan, { kind: 'respond' }>;

/** Holder whose identity marks one live call; replaced on restart, dropped on end */
interface CallSession {
  state: CallState;
}

const DEFAULT_OPTIONS: CallFlowOptions = {
  retryBudget: 3,
  horizonDays: 14,
  inactivityMinutes: 10,
  historyLimit: 20,
};

// search → lookup → search → commit → search is the longest legitimate chain
const MAX_EFFECT_STEPS = 4;

// ═══════════════════════════════════════════════
// Call Flow Controller
// ═══════════════════════════════════════════════

export class CallFlowController {
  private readonly calls = new Map<string, CallSession>();
  private readonly lock = new KeyedLock();
  private readonly config: ClinicConfig;
  private readonly extractor: EntityExtractor;
  private readonly resolver: AvailabilityResolver;
  private readonly clock: () => Date;
  private readonly options: CallFlowOptions;

  constructor(deps: CallFlowDeps) {
    this.config = deps.config;
    this.extractor = deps.extractor;
    this.resolver = deps.resolver;
    this.clock = deps.clock ?? (() => new Date());
    this.options = { ...DEFAULT_OPTIONS, ...deps.options };
  }

  get activeCallCount(): number {
    return this.calls.size;
  }

  getCallState(callId: string): CallState | undefined {
    return this.calls.get(callId)?.state;
  }

  /**
   * Process one caller turn. Turns for the same call run one at a time.
   */
  async handleTurn(event: InboundTurnEvent): Promise<TurnResponse> {
    if (event.isCallEnd) {
      this.endCall(event.callId, 'call-end event');
      return { prompt: '', shouldEndCall: true };
    }
    return this.lock.run(event.callId, () => this.runTurn(event));
  }

  /**
   * Destroy a call's state. A turn still in flight finishes but its result is dropped.
   */
  endCall(callId: string, reason = 'ended'): boolean {
    const existed = this.calls.delete(callId);
    if (existed) {
      console.log(`[CallFlow] 📴 Call ${callId} ended (${reason}); ${this.calls.size} active`);
    }
    return existed;
  }

  /**
   * Drop calls that have been silent longer than the inactivity timeout
   */
  sweepInactive(now: Date = this.clock()): number {
    const cutoff = now.getTime() - this.options.inactivityMinutes * 60_000;
    let removed = 0;
    for (const [callId, session] of Array.from(this.calls.entries())) {
      if (Date.parse(session.state.lastActivityAt) < cutoff) {
        this.calls.delete(callId);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(
        `[CallFlow] 🧹 Swept ${removed} inactive call(s); ${this.calls.size} active, ${this.lock.size} mid-turn`
      );
    }
    return removed;
  }

  private planContext(now: Date): PlanContext {
    return {
      config: this.config,
      now,
      retryBudget: this.options.retryBudget,
      horizonDays: this.options.horizonDays,
    };
  }

  private async runTurn(event: InboundTurnEvent): Promise<TurnResponse> {
    const now = this.clock();
    const utterance = event.utterance.trim();

    let session = this.calls.get(event.callId);
    const isNew = !session || event.isCallStart === true;
    if (!session || event.isCallStart) {
      session = { state: createCallState(event.callId, now, event.callerNumber) };
      this.calls.set(event.callId, session);
      console.log(`[CallFlow] 📞 Call ${event.callId} started; ${this.calls.size} active`);
    }

    if (isNew && utterance === '') {
      const prompt = prompts.greeting(this.config);
      this.record(session, session.state, utterance, prompt, now);
      return { prompt, shouldEndCall: false };
    }

    const ctx = this.planContext(now);
    const before = session.state;
    console.log(`[CallFlow] 🗣️ ${event.callId} [${before.dialogueState}] "${utterance}"`);

    let extraction = await this.extractor.extract(utterance, buildExtractionContext(before, this.config, now));
    if (event.digits) {
      const keyed = patientInfoSchema.shape.phone.safeParse(event.digits);
      if (keyed.success && keyed.data) {
        console.log(`[CallFlow] 🔢 ${event.callId} keyed a ${keyed.data.length}-digit number`);
        extraction = { ...extraction, entities: { ...extraction.entities, patientPhone: keyed.data } };
      } else {
        console.warn(`[CallFlow] ⚠️ ${event.callId} keyed digits that are not a phone number`);
      }
    }
    console.log(
      `[CallFlow] 🧩 intent=${extraction.intent} (${extraction.source}, ${extraction.confidence}) entities=${JSON.stringify(extraction.entities)}`
    );

    let plan = planTurn(before, extraction, ctx);
    let steps = 0;
    while (plan.kind !== 'respond' && steps < MAX_EFFECT_STEPS) {
      plan = await this.runEffect(plan, ctx);
      steps++;
    }
    if (plan.kind !== 'respond') {
      console.error(`[CallFlow] ❌ Effect chain did not settle for ${event.callId}; handing off`);
      plan = {
        kind: 'respond',
        state: transitionTo({ ...plan.state, pending: undefined }, 'FAILED', 'effect chain'),
        prompt: prompts.handoff(),
        endCall: true,
      };
    }

    if (this.calls.get(event.callId) !== session) {
      console.log(`[CallFlow] ⚠️ Call ${event.callId} ended mid-turn; discarding result`);
      return { prompt: prompts.callAlreadyEnded(), shouldEndCall: true };
    }

    this.record(session, plan.state, utterance, plan.prompt, now);
    console.log(`[CallFlow] 💬 ${event.callId} [${plan.state.dialogueState}] "${plan.prompt}"`);
    const response: TurnResponse = { prompt: plan.prompt, shouldEndCall: plan.endCall };
    if (plan.state.dialogueState === 'COLLECTING_PATIENT_PHONE') response.keypad = true;
    return response;
  }

  private async runEffect(plan: EffectPlan, ctx: PlanContext): Promise<TurnPlan> {
    switch (plan.kind) {
      case 'search': {
        const { query, fallback } = plan.search;
        const matching = await this.resolver.findSlots(query);
        const alternatives = matching.length === 0 && fallback ? await this.resolver.findSlots(fallback) : [];
        return resolveSearch(plan.state, plan.search, { matching, alternatives }, ctx);
      }
      case 'lookup': {
        const appointments = await this.resolver.findAppointments(plan.lookup);
        return resolveLookup(plan.state, plan.lookup, appointments, ctx);
      }
      case 'commit': {
        const { command } = plan;
        const result =
          command.type === 'book'
            ? await this.resolver.book(command.slot, command.patient)
            : command.type === 'reschedule'
              ? await this.resolver.reschedule(command.appointmentId, command.slot)
              : await this.resolver.cancel(command.appointmentId);
        return resolveCommit(plan.state, command, result, ctx);
      }
    }
  }

  private record(session: CallSession, state: CallState, utterance: string, prompt: string, now: Date): void {
    const at = now.toISOString();
    const turn: TurnRecord = { at, utterance, prompt, state: state.dialogueState };
    session.state = {
      ...state,
      history: [...state.history, turn].slice(-this.options.historyLimit),
      lastActivityAt: at,
    };
  }
}
