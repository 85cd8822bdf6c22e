import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ModelEvents, globalModelEvents } from "../../../src/events/model-events";
import { Model } from "../../../src/model/model";
import { Person } from "../../fixtures/models/test-models";
import { useMemoryDataSource } from "../../utils/test-helpers";

class Ticket extends Model {
  public static table = "tickets";
}

describe("Model Events System", () => {
  beforeEach(() => {
    useMemoryDataSource();
    globalModelEvents.clear();
  });

  afterEach(() => {
    Ticket.events().clear();
  });

  describe("ModelEvents Class", () => {
    it("should register and trigger listeners", async () => {
      const events = new ModelEvents<Ticket>();
      const listener = vi.fn();
      const ticket = new Ticket();

      events.on("saving", listener);
      await events.emit("saving", ticket, { mode: "insert" });

      expect(listener).toHaveBeenCalledWith(ticket, { mode: "insert" });
    });

    it("should remove listeners with off() and the returned unsubscribe", async () => {
      const events = new ModelEvents<Ticket>();
      const first = vi.fn();
      const second = vi.fn();

      events.on("saving", first);
      const unsubscribe = events.on("saving", second);

      events.off("saving", first);
      unsubscribe();

      await events.emit("saving", new Ticket(), {});

      expect(first).not.toHaveBeenCalled();
      expect(second).not.toHaveBeenCalled();
      expect(events.listeners.has("saving")).toBe(false);
    });

    it("should support once() listeners", async () => {
      const events = new ModelEvents<Ticket>();
      const listener = vi.fn();

      events.once("saving", listener);

      await events.emit("saving", new Ticket(), {});
      await events.emit("saving", new Ticket(), {});

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it("should await listeners in registration order", async () => {
      const events = new ModelEvents<Ticket>();
      const calls: string[] = [];

      events.onSaving(async () => {
        await Promise.resolve();
        calls.push("first");
      });
      events.onSaving(() => {
        calls.push("second");
      });

      await events.emit("saving", new Ticket(), {});

      expect(calls).toEqual(["first", "second"]);
    });
  });

  describe("Model Integration", () => {
    it("should reach instance, class and global listeners in that order", async () => {
      const calls: string[] = [];
      const ticket = new Ticket();

      globalModelEvents.on("saving", () => {
        calls.push("global");
      });
      Ticket.on("saving", () => {
        calls.push("class");
      });
      ticket.on("saving", () => {
        calls.push("instance");
      });

      await ticket.emitEvent("saving", {});

      expect(calls).toEqual(["instance", "class", "global"]);
    });

    it("should fire the insert lifecycle in order", async () => {
      const calls: string[] = [];
      const ticket = new Ticket({ title: "Broken lamp" });

      for (const event of ["saving", "validating", "creating", "saved", "created"] as const) {
        ticket.on(event, () => {
          calls.push(event);
        });
      }

      await ticket.save();

      expect(calls).toEqual(["saving", "validating", "creating", "saved", "created"]);
    });

    it("should fire the update lifecycle with its context", async () => {
      const ticket = await Ticket.create({ title: "Broken lamp" });
      const saving = vi.fn();
      const updated = vi.fn();

      ticket.on("saving", saving);
      ticket.on("updated", updated);

      ticket.set("title", "Broken lamps");
      await ticket.save();

      expect(saving).toHaveBeenCalledWith(ticket, { isInsert: false, mode: "update" });
      expect(updated).toHaveBeenCalledTimes(1);
    });

    it("should let a saving listener enrich the record", async () => {
      Ticket.events().onSaving((model) => {
        model.set("status", "open");
      });

      const ticket = await Ticket.create({ title: "Broken lamp" });

      expect(ticket.get("status")).toBe("open");
    });

    it("should not fire events when skipped", async () => {
      const listener = vi.fn();
      const ticket = new Ticket({ title: "Broken lamp" });

      ticket.on("saving", listener);
      await ticket.save({ skipEvents: true });

      expect(listener).not.toHaveBeenCalled();
    });

    it("should keep class listeners per model", async () => {
      const listener = vi.fn();

      Ticket.on("saving", listener);
      await new Person({ name: "Ann" }).emitEvent("saving", {});

      expect(listener).not.toHaveBeenCalled();
    });
  });
});
