import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

/**
 * Append-only record of one assistant interaction.
 * Rows are never updated or removed by the application.
 */
@Entity('ChatLog')
@Index('IDX_chatlog_timestamp', ['timestamp'])
export class ChatLog {
  @PrimaryGeneratedColumn()
  id!: number;

  @CreateDateColumn({ name: 'timestamp' })
  timestamp!: Date;

  @Column({ type: 'text' })
  query!: string;

  @Column({ type: 'text' })
  response!: string;
}
