/**
 * Orders an (opening, closing) event pair for one window.
 *
 * A closing event that does not come strictly after the opening event is
 * recomputed once from a later anchor. A second violation fails the pair.
 *
 *   initial --ok--> resolved
 *   initial --closing <= opening--> shifted --ok--> resolved
 *                                   shifted --closing <= opening--> failed
 */
export type PairingStatus = 'initial' | 'shifted' | 'resolved' | 'failed';

export interface PairingState {
  status: PairingStatus;
  opening: number;
  closing: number;
}

export type TerminalPairingState = PairingState & { status: 'resolved' | 'failed' };

export const advancePairing = (state: PairingState, recomputeClosing: () => number): PairingState => {
  switch (state.status) {
    case 'initial':
      if (state.closing > state.opening) {
        return { ...state, status: 'resolved' };
      }
      return { status: 'shifted', opening: state.opening, closing: recomputeClosing() };
    case 'shifted':
      return { ...state, status: state.closing > state.opening ? 'resolved' : 'failed' };
    case 'resolved':
    case 'failed':
      return state;
  }
};

const isTerminal = (state: PairingState): state is TerminalPairingState =>
  state.status === 'resolved' || state.status === 'failed';

export const runPairing = (opening: number, closing: number, recomputeClosing: () => number): TerminalPairingState => {
  let state: PairingState = { status: 'initial', opening, closing };
  for (;;) {
    if (isTerminal(state)) {
      return state;
    }
    state = advancePairing(state, recomputeClosing);
  }
};
