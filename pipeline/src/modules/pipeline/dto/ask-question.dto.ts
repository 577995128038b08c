import { Transform } from 'class-transformer';
import { IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export const MAX_QUESTION_LENGTH = 5000;
export const MAX_RESPONSES_LIMIT = 50;

export class AskQuestionDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty({ message: 'question must not be empty' })
  @MaxLength(MAX_QUESTION_LENGTH)
  question!: string;

  /** Lowest cosine similarity a chunk needs to count as evidence. */
  @IsOptional()
  @IsNumber()
  @Min(-1)
  @Max(1)
  similarityLimit?: number;

  /** Most chunks handed to the language model. */
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_RESPONSES_LIMIT)
  maxResponses?: number;
}
