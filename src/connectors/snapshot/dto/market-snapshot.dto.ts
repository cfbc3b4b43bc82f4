import {
  ArrayMinSize,
  IsArray,
  IsDate,
  IsEnum,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { MarketType, VenueId } from '../../../common/types/index.js';

export class SnapshotSideDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  price!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  volume24h?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  liquidity?: number;
}

export class SnapshotFeeDto {
  @IsNumber()
  @Min(0)
  @Max(1)
  tradingFeeRate!: number;

  @IsNumber()
  @Min(0)
  fixedCost!: number;

  @IsOptional()
  @IsString()
  description?: string;
}

export class SnapshotEventDto {
  @IsString()
  @IsNotEmpty()
  eventId!: string;

  @IsEnum(VenueId)
  venue!: VenueId;

  /** Venue-side market id; the depth source is keyed by it */
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  marketId?: string;

  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsArray()
  @IsString({ each: true })
  entities: string[] = [];

  @IsString()
  category: string = 'general';

  @IsString()
  resolutionCriteria: string = '';

  @IsOptional()
  @IsString()
  resolutionSourceUrl?: string;

  // js-yaml already turns unquoted ISO timestamps into Dates
  @Type(() => Date)
  @IsDate()
  deadline!: Date;

  @IsEnum(MarketType)
  marketType: MarketType = MarketType.BINARY;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => SnapshotSideDto)
  contractSides!: SnapshotSideDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => SnapshotFeeDto)
  feeSchedule?: SnapshotFeeDto;

  @IsOptional()
  @IsNumber()
  @Min(0)
  totalVolume?: number;
}

export class SnapshotBookLevelDto {
  @IsNumber()
  price!: number;

  @IsNumber()
  size!: number;
}

export class SnapshotOrderBookDto {
  @IsString()
  @IsNotEmpty()
  marketId!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SnapshotBookLevelDto)
  bids: SnapshotBookLevelDto[] = [];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SnapshotBookLevelDto)
  asks: SnapshotBookLevelDto[] = [];
}

export class MarketSnapshotDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SnapshotEventDto)
  events: SnapshotEventDto[] = [];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SnapshotOrderBookDto)
  orderBooks: SnapshotOrderBookDto[] = [];

  /**
   * Uniqueness rules the decorators cannot express.
   * Returns human-readable errors; empty when the snapshot is coherent.
   */
  static validateCrossFieldRules(snapshot: MarketSnapshotDto): string[] {
    const errors: string[] = [];

    const eventIds = new Set<string>();
    for (const [index, event] of snapshot.events.entries()) {
      if (eventIds.has(event.eventId)) {
        errors.push(`events[${index}].eventId: duplicate event ${event.eventId}`);
      }
      eventIds.add(event.eventId);

      const sideNames = new Set<string>();
      for (const side of event.contractSides) {
        if (sideNames.has(side.name)) {
          errors.push(
            `events[${index}].contractSides: duplicate side ${side.name}`,
          );
        }
        sideNames.add(side.name);
      }
    }

    const marketIds = new Set<string>();
    for (const [index, book] of snapshot.orderBooks.entries()) {
      if (marketIds.has(book.marketId)) {
        errors.push(
          `orderBooks[${index}].marketId: duplicate order book for ${book.marketId}`,
        );
      }
      marketIds.add(book.marketId);
    }

    return errors;
  }
}
