import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Farmer } from './farmer.entity';

@Entity('fields')
export class Field {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'farmer_id' })
  @Index()
  farmerId!: number;

  @ManyToOne(() => Farmer, (farmer) => farmer.fields)
  @JoinColumn({ name: 'farmer_id' })
  farmer!: Farmer;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 128, nullable: true })
  crop!: string | null;

  @Column({ name: 'area_hectares', type: 'float', nullable: true })
  areaHectares!: number | null;

  @Column({ name: 'planting_date', type: 'date', nullable: true })
  plantingDate!: string | null;
}
