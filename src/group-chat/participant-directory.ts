/**
 * Participant Directory
 *
 * The enrolled participants of one group chat, in enrolment order, and the
 * consecutive-turn counter of each.
 */

import type { ParticipantInfo } from '../types.js';

export class ParticipantDirectory {
  private participants = new Map<string, ParticipantInfo>();
  private consecutiveTurns = new Map<string, number>();

  /**
   * Add or replace a participant. A replaced participant keeps its position
   * and its counter.
   * @returns whether an existing participant was replaced
   */
  add(info: ParticipantInfo): boolean {
    const replaced = this.participants.has(info.agentName);
    this.participants.set(info.agentName, Object.freeze({ ...info }));
    if (!replaced) {
      this.consecutiveTurns.set(info.agentName, 0);
    }
    return replaced;
  }

  remove(agentName: string): boolean {
    this.consecutiveTurns.delete(agentName);
    return this.participants.delete(agentName);
  }

  get(agentName: string): ParticipantInfo | undefined {
    return this.participants.get(agentName);
  }

  has(agentName: string): boolean {
    return this.participants.has(agentName);
  }

  list(): ParticipantInfo[] {
    return [...this.participants.values()];
  }

  names(): string[] {
    return [...this.participants.keys()];
  }

  /** Participants allowed to speak: everyone but observers */
  active(): ParticipantInfo[] {
    return this.list().filter((p) => p.role !== 'observer');
  }

  get size(): number {
    return this.participants.size;
  }

  getConsecutiveTurns(agentName: string): number {
    return this.consecutiveTurns.get(agentName) ?? 0;
  }

  /**
   * The speaker's counter goes up by one; everyone else's drops to zero.
   */
  recordTurn(speaker: string): void {
    for (const name of this.participants.keys()) {
      this.consecutiveTurns.set(name, name === speaker ? this.getConsecutiveTurns(name) + 1 : 0);
    }
  }

  resetCounters(names: Iterable<string> = this.participants.keys()): void {
    for (const name of names) {
      if (this.participants.has(name)) {
        this.consecutiveTurns.set(name, 0);
      }
    }
  }

  clear(): void {
    this.participants.clear();
    this.consecutiveTurns.clear();
  }
}
