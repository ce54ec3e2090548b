export interface IParticipant {
  rollNumber: string;
  name: string;
  score: number;
  lastPlayed: Date; //timestamp of the latest accepted shot
}

export interface IHitDetails {
  rollNumber: string;
  name: string;
  shot: number; //signed, added to the cumulative score
  playedAt: Date;
}

//persistence seam shared by the mongo store and the in-memory store
export interface IParticipantStore {
  incrementScore(hit: IHitDetails): Promise<void>;
  listByScore(): Promise<IParticipant[]>;
}
