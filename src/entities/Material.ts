import { Entity, PrimaryGeneratedColumn, Column, ManyToMany, JoinTable } from "typeorm";
import { Language } from "./Language";

// Equipment a game needs (e.g. Basketball, Halfcourt, Hoop)
@Entity()
export class Material {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 100, unique: true })
  name!: string;

  @Column("text", { default: "" })
  description!: string;

  @ManyToMany(() => Language)
  @JoinTable({ name: "material_languages" })
  languages!: Language[];
}
