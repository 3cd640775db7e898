import { SessionState } from "./SessionState";

export class SessionStateMachine {
  constructor(private readonly state: SessionState = new SessionState()) {}

  get value() {
    return this.state.value;
  }

  get isConnected(): boolean {
    return this.state.value === "CONNECTED";
  }

  onConnectStarted() {
    if (this.state.value !== "DISCONNECTED") {
      throw new Error(`Cannot connect while session is ${this.state.value}.`);
    }
    this.state.toConnecting();
  }

  onConnected() {
    if (this.state.value === "CONNECTING") {
      this.state.toConnected();
    }
  }

  onConnectFailed() {
    if (this.state.value === "CONNECTING") {
      this.state.toDisconnected();
    }
  }

  /** Returns false when the session was already closed. */
  onClosed(): boolean {
    if (this.state.value === "CLOSED") return false;
    this.state.toClosed();
    return true;
  }
}
