import { Entity, PrimaryColumn, Column, UpdateDateColumn } from "typeorm";

// Per-browser state keyed by the sessionId cookie
@Entity()
export class VisitorSession {
  @PrimaryColumn("uuid")
  id!: string;

  // Game ids in the order they were added
  @Column("simple-json", { default: "[]" })
  cart!: number[];

  @Column({ type: "varchar", length: 10, nullable: true })
  language!: string | null;

  @UpdateDateColumn()
  updatedAt!: Date;
}
