import { SessionStore } from "./session-store";

const HOUR = 60 * 60 * 1000;

describe("SessionStore", () => {
  it("creates a session for an unknown id", () => {
    const store = new SessionStore({ idleTimeoutMs: HOUR });

    const session = store.initialize("missing");

    expect(session.id).not.toBe("missing");
    expect(session.toView().groups).toHaveLength(1);
    expect(store.size).toBe(1);
  });

  it("returns the existing session when initialized again", () => {
    const store = new SessionStore({ idleTimeoutMs: HOUR });
    const first = store.initialize();
    first.addGroup();

    const second = store.initialize(first.id);

    expect(second).toBe(first);
    expect(second.toView().groups).toHaveLength(2);
    expect(store.size).toBe(1);
  });

  it("keeps sessions apart", () => {
    const store = new SessionStore({ idleTimeoutMs: HOUR });
    const a = store.initialize();
    const b = store.initialize();

    a.addGroup();

    expect(a.id).not.toBe(b.id);
    expect(b.toView().groups).toHaveLength(1);
  });

  describe("idle expiry", () => {
    let now: number;
    let store: SessionStore;

    beforeEach(() => {
      now = 0;
      store = new SessionStore({ idleTimeoutMs: HOUR, now: () => now });
    });

    it("keeps a session that is used within the timeout", () => {
      const session = store.initialize();
      now = HOUR - 1;
      store.initialize(session.id);
      now = 2 * HOUR - 2;

      expect(store.initialize(session.id)).toBe(session);
    });

    it("replaces a session that has been idle for the timeout", () => {
      const session = store.initialize();
      session.addGroup();
      now = HOUR;

      const next = store.initialize(session.id);

      expect(next).not.toBe(session);
      expect(next.toView().groups).toHaveLength(1);
      expect(store.size).toBe(1);
    });

    it("drops idle sessions of other users", () => {
      const stale = store.initialize();
      now = HOUR / 2;
      const active = store.initialize();
      now = HOUR;
      store.initialize(active.id);

      expect(store.size).toBe(1);
      expect(store.evictIdle(2 * HOUR)).toBe(1);
      expect(store.size).toBe(0);
      expect(stale.id).not.toBe(active.id);
    });
  });
});
