import type { IHitDetails, IParticipant, IParticipantStore } from "../types";

//in-process stand-in for the mongo collection, same upsert semantics
export class MemoryParticipantStore implements IParticipantStore {
  private participants = new Map<string, IParticipant>();

  async incrementScore(hit: IHitDetails): Promise<void> {
    const existing = this.participants.get(hit.rollNumber);
    this.participants.set(hit.rollNumber, {
      rollNumber: hit.rollNumber,
      name: hit.name,
      score: (existing?.score ?? 0) + hit.shot,
      lastPlayed: hit.playedAt,
    });
  }

  async listByScore(): Promise<IParticipant[]> {
    return [...this.participants.values()]
      .sort((a, b) => b.score - a.score)
      .map((participant) => ({ ...participant }));
  }

  async find(rollNumber: string): Promise<IParticipant | undefined> {
    const participant = this.participants.get(rollNumber);
    return participant ? { ...participant } : undefined;
  }
}
