export enum CallbackGroupType {
    MutuallyExclusive = "mutually_exclusive",
    Reentrant = "reentrant",
}
