import type { SessionStateValue } from "./types";

export class SessionState {
  private current: SessionStateValue = "DISCONNECTED";

  get value(): SessionStateValue {
    return this.current;
  }

  toDisconnected() {
    this.current = "DISCONNECTED";
  }

  toConnecting() {
    this.current = "CONNECTING";
  }

  toConnected() {
    this.current = "CONNECTED";
  }

  toClosed() {
    this.current = "CLOSED";
  }
}
