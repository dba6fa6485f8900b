import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from "typeorm";

/**
 * Admin-authored markdown shown in a fixed informational surface.
 * About and Impressum blocks share these columns but live in separate tables.
 */
export abstract class ContentBlock {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 200 })
  title!: string;

  @Column("text")
  content!: string;

  @Column({ default: true })
  isActive!: boolean;

  @Column("int", { default: 0 })
  order!: number;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}

@Entity()
export class AboutContent extends ContentBlock {}

@Entity()
export class ImpressumContent extends ContentBlock {}
