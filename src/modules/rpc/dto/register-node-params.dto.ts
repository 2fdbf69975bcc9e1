import { IsNotEmpty, IsString } from 'class-validator';

/** Params of the node → control plane `backend.register` call. */
export class RegisterNodeParamsDto {
  /** Client-generated identifier, stable across reconnects. */
  @IsString()
  @IsNotEmpty()
  uuid!: string;
}

/** Result of `backend.register`. */
export interface RegisterNodeResult {
  id: number;
}
