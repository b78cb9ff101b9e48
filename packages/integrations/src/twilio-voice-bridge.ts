import twilio from 'twilio';

export interface InboundCall {
  from: string;
  to: string;
  callSid: string;
}

export interface VoiceBridgeOptions {
  streamUrl: string;
  agentId: string | undefined;
}

function readFormField(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  return typeof value === 'string' ? value : '';
}

export function parseInboundCall(body: Record<string, unknown>): InboundCall {
  return {
    from: readFormField(body, 'From'),
    to: readFormField(body, 'To'),
    callSid: readFormField(body, 'CallSid'),
  };
}

export function buildAgentStreamUrl(streamUrl: string, agentId: string): string {
  const url = new URL(streamUrl);
  url.searchParams.set('agent_id', agentId);
  return url.toString();
}

/**
 * TwiML that hands an inbound call to the voice agent's media stream. Without
 * an agent id the caller hears a short apology and the call ends.
 */
export function buildVoiceBridgeTwiml(call: InboundCall, options: VoiceBridgeOptions): string {
  const response = new twilio.twiml.VoiceResponse();

  if (options.agentId === undefined) {
    response.say('Sorry, our assistant is unavailable right now. Please call again later.');
    response.hangup();
    return response.toString();
  }

  const stream = response.connect().stream({
    url: buildAgentStreamUrl(options.streamUrl, options.agentId),
  });
  stream.parameter({ name: 'caller_number', value: call.from });
  stream.parameter({ name: 'called_number', value: call.to });
  stream.parameter({ name: 'call_sid', value: call.callSid });

  return response.toString();
}
