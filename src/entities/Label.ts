import { Entity, PrimaryGeneratedColumn, Column, ManyToMany, JoinTable } from "typeorm";
import { Language } from "./Language";

@Entity()
export class Label {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 100, unique: true })
  name!: string;

  // Hex swatch
  @Column({ type: "varchar", length: 7, default: "#007bff" })
  color!: string;

  @ManyToMany(() => Language)
  @JoinTable({ name: "label_languages" })
  languages!: Language[];
}
