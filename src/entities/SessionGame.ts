import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from "typeorm";
import { TrainingSession } from "./TrainingSession";
import { Game } from "./Game";

// A game placed in a training session, with its position and timing
@Entity()
@Unique(["sessionId", "gameId", "order"])
export class SessionGame {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column("int")
  sessionId!: number;

  @ManyToOne(() => TrainingSession, (session) => session.entries, { onDelete: "CASCADE" })
  @JoinColumn({ name: "sessionId" })
  session!: TrainingSession;

  @Column("int")
  gameId!: number;

  @ManyToOne(() => Game, { onDelete: "CASCADE" })
  @JoinColumn({ name: "gameId" })
  game!: Game;

  @Column("int", { default: 0 })
  order!: number;

  // 0.5 = half time, 2.0 = double time
  @Column("float", { default: 1.0 })
  durationMultiplier!: number;

  @Column("text", { default: "" })
  notes!: string;
}
