import { Entity, PrimaryGeneratedColumn, Column, ManyToMany, JoinTable } from "typeorm";
import { Language } from "./Language";

// Focus areas for games (e.g. Dribbling, Teamwork, Layups)
@Entity()
export class Focus {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 100, unique: true })
  name!: string;

  @Column("text", { default: "" })
  description!: string;

  @ManyToMany(() => Language)
  @JoinTable({ name: "focus_languages" })
  languages!: Language[];
}
