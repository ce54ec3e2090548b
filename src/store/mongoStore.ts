import { MongoClient, type Collection } from "mongodb";
import type { IHitDetails, IParticipant, IParticipantStore } from "../types";
import { Logger } from "../utils/logger";
import { PARTICIPANTS } from "../utils/data-helpers";

const logger = new Logger("mongoStore");

export interface ParticipantDocument {
  rollNumber: string;
  name: string;
  score: number;
  lastPlayed: Date;
}

export class MongoParticipantStore implements IParticipantStore {
  private constructor(
    private readonly client: MongoClient,
    private readonly collection: Collection<ParticipantDocument>
  ) {}

  //connects and pings, any failure here is fatal for the process
  static async connect(
    uri: string,
    dbName: string,
    timeoutMs: number
  ): Promise<MongoParticipantStore> {
    const client = new MongoClient(uri, {
      serverSelectionTimeoutMS: timeoutMs,
      connectTimeoutMS: timeoutMs,
    });

    await client.connect();
    const db = client.db(dbName);
    await db.command({ ping: 1 });
    logger.info(`connected to ${dbName}.${PARTICIPANTS}`);

    return new MongoParticipantStore(
      client,
      db.collection<ParticipantDocument>(PARTICIPANTS)
    );
  }

  async ensureIndexes(): Promise<void> {
    try {
      await this.collection.createIndex({ rollNumber: 1 }, { unique: true });
    } catch (error) {
      logger.error("Failed to create rollNumber index", error);
    }
  }

  async incrementScore(hit: IHitDetails): Promise<void> {
    await this.collection.updateOne(
      { rollNumber: hit.rollNumber },
      {
        $inc: { score: hit.shot },
        $set: { lastPlayed: hit.playedAt, name: hit.name },
        $setOnInsert: { rollNumber: hit.rollNumber },
      },
      { upsert: true }
    );
  }

  async listByScore(): Promise<IParticipant[]> {
    const documents = await this.collection
      .find({})
      .sort({ score: -1 })
      .toArray();

    return documents.map(({ rollNumber, name, score, lastPlayed }) => ({
      rollNumber,
      name,
      score,
      lastPlayed,
    }));
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
