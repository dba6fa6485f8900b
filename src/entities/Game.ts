import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  ManyToMany,
  JoinTable,
  JoinColumn,
  Index,
} from "typeorm";
import { Focus } from "./Focus";
import { Material } from "./Material";
import { Label } from "./Label";
import { Language } from "./Language";
import { User } from "./User";
import { DURATION_VALUES, PLAYER_COUNT_VALUES } from "../config/catalog";
import type { Duration, PlayerCount } from "../config/catalog";

// A game or exercise for sports training
@Entity()
@Index(["isActive", "isSuggestion", "approved"])
export class Game {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 200 })
  name!: string;

  @Column("text")
  description!: string;

  @Column({ type: "enum", enum: PLAYER_COUNT_VALUES })
  playerCount!: PlayerCount;

  @Column({ type: "enum", enum: DURATION_VALUES })
  duration!: Duration;

  @Column("text", { default: "" })
  variants!: string;

  @ManyToMany(() => Focus)
  @JoinTable({ name: "game_focus", joinColumn: { name: "gameId" }, inverseJoinColumn: { name: "focusId" } })
  focus!: Focus[];

  @ManyToMany(() => Material)
  @JoinTable({ name: "game_materials", joinColumn: { name: "gameId" }, inverseJoinColumn: { name: "materialId" } })
  materials!: Material[];

  @ManyToMany(() => Label)
  @JoinTable({ name: "game_labels", joinColumn: { name: "gameId" }, inverseJoinColumn: { name: "labelId" } })
  labels!: Label[];

  @ManyToMany(() => Language)
  @JoinTable({ name: "game_languages", joinColumn: { name: "gameId" }, inverseJoinColumn: { name: "languageId" } })
  languages!: Language[];

  @Column({ default: true })
  isActive!: boolean;

  @Column({ type: "int", nullable: true })
  createdById!: number | null;

  @ManyToOne(() => User, { onDelete: "SET NULL", nullable: true })
  @JoinColumn({ name: "createdById" })
  createdBy?: User | null;

  @Column({ type: "int", nullable: true })
  suggestedById!: number | null;

  @ManyToOne(() => User, { onDelete: "SET NULL", nullable: true })
  @JoinColumn({ name: "suggestedById" })
  suggestedBy?: User | null;

  // User suggestions stay hidden until approved
  @Column({ default: false })
  isSuggestion!: boolean;

  @Column({ default: false })
  approved!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
