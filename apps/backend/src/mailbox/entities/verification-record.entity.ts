import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { Mailbox } from './mailbox.entity';

@Entity('verification_records')
@Unique('UQ_verification_records_mailbox_message', [
  'mailboxAddress',
  'sourceMessageId',
])
@Index(['mailboxAddress', 'receivedAt'])
export class VerificationRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  mailboxAddress!: string;

  @ManyToOne(() => Mailbox, (mailbox) => mailbox.verifications, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'mailboxAddress', referencedColumnName: 'address' })
  mailbox?: Mailbox;

  @Column()
  code!: string;

  @Column()
  patternName!: string;

  @Column()
  sourceMessageId!: string;

  @Column({ type: 'text', nullable: true })
  sender?: string | null;

  @Column({ type: 'text', nullable: true })
  subject?: string | null;

  @Column({ type: 'text', nullable: true })
  content?: string | null;

  @Column({ type: 'timestamp' })
  receivedAt!: Date;

  @Column({ type: 'timestamp' })
  extractedAt!: Date;

  @Column({ default: false })
  isRead!: boolean;
}
