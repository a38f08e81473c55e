import { Entity, PrimaryGeneratedColumn, Column, OneToMany } from 'typeorm';
import { Field } from './field.entity';

@Entity('farmers')
export class Farmer {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'whatsapp_number', type: 'varchar', length: 32, unique: true })
  whatsappNumber!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  name!: string | null;

  @Column({ name: 'country_code', type: 'varchar', length: 2 })
  countryCode!: string;

  @Column({ name: 'preferred_language', type: 'varchar', length: 16, nullable: true })
  preferredLanguage!: string | null;

  @OneToMany(() => Field, (field) => field.farmer)
  fields!: Field[];
}
