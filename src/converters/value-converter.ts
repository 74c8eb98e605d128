export interface ValueConverter<Source, Destination> {
  convert(value: Source): Destination;

  convertBack(value: Destination): Source;
}

export type ValueConverterType<Source, Destination> = new () => ValueConverter<
  Source,
  Destination
>;
