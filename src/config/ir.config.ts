import { registerAs } from '@nestjs/config';
import { IsEnum, IsIn, IsNotEmpty, IsString } from 'class-validator';
import { validateConfig } from './config-validation';
import { DEFAULT_CHARACTER_ENCODING, SUPPORTED_CHARACTER_ENCODINGS } from '../common/character-encoding';
import { ByteOrder } from '../ir/types';

/**
 * Defaults applied while building schemas
 * Validated using class-validator decorators
 */
export class IrConfig {
  @IsString()
  @IsNotEmpty()
  headerType!: string;

  @IsString()
  @IsNotEmpty()
  groupDimensionType!: string;

  @IsEnum(ByteOrder)
  byteOrder!: ByteOrder;

  @IsIn(SUPPORTED_CHARACTER_ENCODINGS)
  characterEncoding!: string;
}

/**
 * IR configuration factory
 * Loads builder defaults from environment variables
 */
export default registerAs('ir', (): IrConfig => {
  const rawConfig = {
    headerType: process.env.IR_HEADER_TYPE || 'messageHeader',
    groupDimensionType: process.env.IR_GROUP_DIMENSION_TYPE || 'groupSizeEncoding',
    byteOrder: process.env.IR_BYTE_ORDER || ByteOrder.LittleEndian,
    characterEncoding: (process.env.IR_CHARACTER_ENCODING || DEFAULT_CHARACTER_ENCODING).toUpperCase(),
  };

  return validateConfig(rawConfig, 'ir', IrConfig);
});
