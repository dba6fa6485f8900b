import { Entity, PrimaryGeneratedColumn, Column } from "typeorm";

@Entity()
export class Language {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 10, unique: true })
  code!: string;

  @Column({ type: "varchar", length: 50 })
  name!: string;
}
