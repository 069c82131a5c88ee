
const TYPES = {
    Clock : Symbol.for("Clock"),
    IEventLog : Symbol.for("IEventLog"),
    EventLogFactory : Symbol.for("EventLogFactory"),
    EventRegistry : Symbol.for("EventRegistry"),
    IEventPublisher : Symbol.for("IEventPublisher"),
    EventStore : Symbol.for("EventStore"),
    EventMonitor : Symbol.for("EventMonitor"),
    ISessionManager : Symbol.for("ISessionManager"),
    PresenceTracker : Symbol.for("PresenceTracker"),
    ICollaborationService : Symbol.for("ICollaborationService"),
    IDocumentStore : Symbol.for("IDocumentStore"),
    HttpDocumentStoreOptions : Symbol.for("HttpDocumentStoreOptions"),
    DocumentServiceBreaker : Symbol.for("DocumentServiceBreaker"),
    IIdentityProvider : Symbol.for("IIdentityProvider"),
    SocketManager : Symbol.for("SocketManager"),
}

export default TYPES
