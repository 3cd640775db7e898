export type SessionStateValue = "DISCONNECTED" | "CONNECTING" | "CONNECTED" | "CLOSED";
