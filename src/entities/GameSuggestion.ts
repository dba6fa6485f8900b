import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  OneToOne,
  ManyToOne,
  JoinColumn,
} from "typeorm";
import { Game } from "./Game";
import { User } from "./User";

export enum SuggestionStatus {
  PENDING = "pending",
  APPROVED = "approved",
  REJECTED = "rejected",
}

@Entity()
export class GameSuggestion {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column("int", { unique: true })
  gameId!: number;

  @OneToOne(() => Game, { onDelete: "CASCADE" })
  @JoinColumn({ name: "gameId" })
  game!: Game;

  @Column("int")
  submittedById!: number;

  @ManyToOne(() => User, { onDelete: "CASCADE" })
  @JoinColumn({ name: "submittedById" })
  submittedBy!: User;

  @CreateDateColumn()
  submittedAt!: Date;

  @Column("text", { default: "" })
  adminNotes!: string;

  @Column({
    type: "enum",
    enum: SuggestionStatus,
    default: SuggestionStatus.PENDING,
  })
  status!: SuggestionStatus;
}
