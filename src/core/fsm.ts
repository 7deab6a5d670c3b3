export enum State {
  AWAITING_MODEL = 'AWAITING_MODEL',
  EXECUTING_TOOLS = 'EXECUTING_TOOLS',
  DONE = 'DONE'
}

const transitions: Record<State, readonly State[]> = {
  [State.AWAITING_MODEL]: [State.EXECUTING_TOOLS, State.DONE],
  [State.EXECUTING_TOOLS]: [State.AWAITING_MODEL],
  [State.DONE]: []
};

export class FSM {
  state: State = State.AWAITING_MODEL;
  round = 0;

  constructor(readonly maxRounds: number) {}

  to(next: State) {
    if (!transitions[this.state].includes(next)) {
      throw new Error(`invalid transition ${this.state} -> ${next}`);
    }
    if (this.state === State.EXECUTING_TOOLS && next === State.AWAITING_MODEL) {
      this.round += 1;
    }
    this.state = next;
  }

  get toolsAllowed(): boolean {
    return this.round < this.maxRounds;
  }
}
