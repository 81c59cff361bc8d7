export enum WorkKind {
    Empty = "empty",
    Subscription = "subscription",
    Timer = "timer",
    Service = "service",
    Client = "client",
    Waitable = "waitable",
}
