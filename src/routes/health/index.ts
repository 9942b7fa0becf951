export async function handleHealthCheck(): Promise<Response> {
    return Response.json({ status: "ok", timestamp: new Date().toISOString() });
}

export async function handleRoot(): Promise<Response> {
    return Response.json({ message: "Greek Nameday API is running." });
}
