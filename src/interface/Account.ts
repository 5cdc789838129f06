export interface Account {
    email: string
    password: string
    enabled?: boolean
}

// Immutable login input handed to the retry loop. The secret never reaches a log line.
export interface Credential {
    readonly identity: string
    readonly secret: string
}
