import 'reflect-metadata';
import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

import {
  RECOMMENDATION_STATUSES,
  RECOMMENDATION_TYPES,
  RecommendationStatus,
  RecommendationType,
} from '../config';

// numeric columns come back from postgres as strings, prices are kept that way
@Entity({ name: 'recommendations' })
export class Recommendation {
    @PrimaryGeneratedColumn({ name: 'recommendation_id' })
    id!: number;

    @Index('idx_recommendations_base_product_id')
    @Column({ type: 'integer' })
    base_product_id!: number;

    @Column({ type: 'integer' })
    recommended_product_id!: number;

    @Index('idx_recommendations_type')
    @Column({ type: 'enum', enum: [...RECOMMENDATION_TYPES], enumName: 'rec_type' })
    recommendation_type!: RecommendationType;

    @Column({ type: 'enum', enum: [...RECOMMENDATION_STATUSES], enumName: 'rec_status', default: 'active' })
    status!: RecommendationStatus;

    @Column({ type: 'numeric', precision: 3, scale: 2 })
    confidence_score!: string;

    @Column({ type: 'numeric', precision: 14, scale: 2, nullable: true })
    base_product_price!: string | null;

    @Column({ type: 'numeric', precision: 14, scale: 2, nullable: true })
    recommended_product_price!: string | null;

    @Column({ type: 'varchar', length: 1023, nullable: true })
    base_product_description!: string | null;

    @Column({ type: 'varchar', length: 1023, nullable: true })
    recommended_product_description!: string | null;

    @CreateDateColumn({ type: 'timestamptz' })
    created_date!: Date;

    @Column({ type: 'timestamptz', default: () => 'now()' })
    updated_date!: Date;
}
